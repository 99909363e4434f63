import { describe, it, expect } from 'vitest';
import { CommandUsageError, helpLines, parseCommand, usageFor } from '../src/commands/parser.js';

describe('parseCommand', () => {
  it('ignores messages without the prefix or with unknown words', () => {
    expect(parseCommand('play something', '!')).toBeNull();
    expect(parseCommand('!', '!')).toBeNull();
    expect(parseCommand('!dance now', '!')).toBeNull();
  });

  it('resolves aliases case-insensitively', () => {
    expect(parseCommand('!p never gonna', '!')).toEqual({ name: 'play', query: 'never gonna' });
    expect(parseCommand('!NP', '!')).toEqual({ name: 'nowplaying' });
    expect(parseCommand('!sr', '!')).toEqual({ name: 'stopradio' });
    expect(parseCommand('?q', '?')).toEqual({ name: 'queue' });
  });

  it('collapses whitespace in free-text arguments', () => {
    expect(parseCommand('!RADIO  chill   lo-fi ', '!')).toEqual({ name: 'radio', description: 'chill lo-fi' });
    expect(parseCommand('!tune jazz\tpiano', '!')).toEqual({ name: 'tune', direction: 'jazz piano' });
    expect(parseCommand('!ap Nina Simone', '!')).toEqual({ name: 'autoplay', artist: 'Nina Simone' });
  });

  it('accepts only up or down for dial', () => {
    expect(parseCommand('!dial UP', '!')).toEqual({ name: 'dial', direction: 'up' });
    expect(() => parseCommand('!dial sideways', '!')).toThrow(CommandUsageError);
    const error = (() => {
      try {
        parseCommand('!dial', '!');
      } catch (thrown) {
        return thrown;
      }
      return null;
    })();
    expect(error).toBeInstanceOf(CommandUsageError);
    expect(error).toMatchObject({ message: 'Dial goes up or down', usage: '!dial up|down' });
  });

  it('parses station subcommands', () => {
    expect(parseCommand('!station save Late Night', '!')).toEqual({ name: 'station-save', station: 'late night' });
    expect(parseCommand('!station delete late night', '!')).toEqual({ name: 'station-delete', station: 'late night' });
    expect(parseCommand('!station Chill', '!')).toEqual({ name: 'station-load', station: 'chill' });
    expect(parseCommand('!stations', '!')).toEqual({ name: 'stations' });
  });

  it('rejects missing arguments with the usage line', () => {
    expect(() => parseCommand('!play', '!')).toThrow('Search query cannot be empty');
    expect(() => parseCommand('!station save', '!')).toThrow('Station name cannot be empty');
    expect(() => parseCommand('!station save bad!name', '!')).toThrow(
      'Station names may only use letters, numbers, spaces, - and _',
    );
  });
});

describe('usage', () => {
  it('prefixes usage lines', () => {
    expect(usageFor('station-save', '!')).toBe('!station save <name>');
    expect(helpLines('!')).toContain('!radio <description>');
    expect(helpLines('!')).toHaveLength(24);
  });
});
