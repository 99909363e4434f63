import type { DialDirection } from '@dialtone/audio';
import { validateFreeText, validateSearchQuery, validateStationName, type ValidationResult } from '../validation.js';

export type Command =
  | { name: 'play'; query: string }
  | { name: 'skip' }
  | { name: 'stop' }
  | { name: 'clear' }
  | { name: 'pause' }
  | { name: 'resume' }
  | { name: 'queue' }
  | { name: 'nowplaying' }
  | { name: 'autoplay'; artist: string }
  | { name: 'stopautoplay' }
  | { name: 'autoplaystatus' }
  | { name: 'radio'; description: string }
  | { name: 'tune'; direction: string }
  | { name: 'dial'; direction: DialDirection }
  | { name: 'static' }
  | { name: 'signal' }
  | { name: 'stopradio' }
  | { name: 'station-save'; station: string }
  | { name: 'station-delete'; station: string }
  | { name: 'station-load'; station: string }
  | { name: 'stations' }
  | { name: 'join' }
  | { name: 'leave' }
  | { name: 'help' };

export type CommandName = Command['name'];

const ALIAS_TABLE: Record<string, CommandName> = {
  play: 'play',
  p: 'play',
  skip: 'skip',
  s: 'skip',
  stop: 'stop',
  clear: 'clear',
  pause: 'pause',
  resume: 'resume',
  queue: 'queue',
  q: 'queue',
  np: 'nowplaying',
  nowplaying: 'nowplaying',
  autoplay: 'autoplay',
  ap: 'autoplay',
  stopautoplay: 'stopautoplay',
  sap: 'stopautoplay',
  autoplaystatus: 'autoplaystatus',
  aps: 'autoplaystatus',
  radio: 'radio',
  r: 'radio',
  tune: 'tune',
  dial: 'dial',
  static: 'static',
  signal: 'signal',
  stopradio: 'stopradio',
  sr: 'stopradio',
  station: 'station-load',
  stations: 'stations',
  join: 'join',
  leave: 'leave',
  help: 'help',
};

const ALIASES = new Map(Object.entries(ALIAS_TABLE));

const USAGE: Record<CommandName, string> = {
  play: 'play <song name or URL>',
  skip: 'skip',
  stop: 'stop',
  clear: 'clear',
  pause: 'pause',
  resume: 'resume',
  queue: 'queue',
  nowplaying: 'np',
  autoplay: 'autoplay <artist>',
  stopautoplay: 'stopautoplay',
  autoplaystatus: 'autoplaystatus',
  radio: 'radio <description>',
  tune: 'tune <direction>',
  dial: 'dial up|down',
  static: 'static',
  signal: 'signal',
  stopradio: 'stopradio',
  'station-save': 'station save <name>',
  'station-delete': 'station delete <name>',
  'station-load': 'station <name>',
  stations: 'stations',
  join: 'join',
  leave: 'leave',
  help: 'help',
};

export function usageFor(name: CommandName, prefix: string): string {
  return `${prefix}${USAGE[name]}`;
}

export function helpLines(prefix: string): string[] {
  return Object.values(USAGE).map((usage) => `${prefix}${usage}`);
}

/** A recognised command with missing or invalid arguments. */
export class CommandUsageError extends Error {
  constructor(
    message: string,
    public readonly usage: string,
  ) {
    super(message);
    this.name = 'CommandUsageError';
  }
}

function argument<T>(result: ValidationResult<T>, name: CommandName, prefix: string): T {
  if (!result.success || result.data === undefined) {
    throw new CommandUsageError(result.error ?? 'Invalid arguments', usageFor(name, prefix));
  }
  return result.data;
}

/**
 * Parses a chat message. Returns null for messages that are not commands
 * (no prefix, unknown word); throws CommandUsageError for known commands
 * with bad arguments.
 */
export function parseCommand(content: string, prefix: string): Command | null {
  if (!content.startsWith(prefix)) return null;
  const body = content.slice(prefix.length).trim();
  const word = body.split(/\s+/, 1)[0]?.toLowerCase() ?? '';
  const name = ALIASES.get(word);
  if (!word || !name) return null;
  const args = body.slice(word.length).trim();

  switch (name) {
    case 'play':
      return { name, query: argument(validateSearchQuery(args), name, prefix) };
    case 'autoplay':
      return { name, artist: argument(validateFreeText(args, 'Artist'), name, prefix) };
    case 'radio':
      return { name, description: argument(validateFreeText(args, 'Description'), name, prefix) };
    case 'tune':
      return { name, direction: argument(validateFreeText(args, 'Direction'), name, prefix) };
    case 'dial': {
      const direction = args.toLowerCase();
      if (direction !== 'up' && direction !== 'down') {
        throw new CommandUsageError('Dial goes up or down', usageFor(name, prefix));
      }
      return { name, direction };
    }
    case 'station-save':
    case 'station-delete':
    case 'station-load':
      return parseStation(args, prefix);
    default:
      return { name };
  }
}

function parseStation(args: string, prefix: string): Command {
  const [sub = '', ...rest] = args.split(/\s+/);
  const remainder = rest.join(' ');
  switch (sub.toLowerCase()) {
    case 'save':
      return { name: 'station-save', station: argument(validateStationName(remainder), 'station-save', prefix) };
    case 'delete':
      return { name: 'station-delete', station: argument(validateStationName(remainder), 'station-delete', prefix) };
    default:
      return { name: 'station-load', station: argument(validateStationName(args), 'station-load', prefix) };
  }
}
