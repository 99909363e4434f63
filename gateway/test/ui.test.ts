import { describe, it, expect } from 'vitest';
import { NoNewCandidatesError, PlaybackFailureError, type Track } from '@dialtone/audio';
import { formatDuration, formatNotice, formatNowPlaying, formatQueue, formatStations } from '../src/ui.js';
import { track } from './support/fakes.js';

describe('formatDuration', () => {
  it('formats minutes and hours', () => {
    expect(formatDuration(65_000)).toBe('1:05');
    expect(formatDuration(3_723_000)).toBe('1:02:03');
  });

  it('shows unknown durations as live', () => {
    expect(formatDuration(0)).toBe('live');
  });
});

describe('formatQueue', () => {
  it('reports an empty queue', () => {
    expect(formatQueue({ current: null, upcoming: [] })).toBe('The queue is empty.');
  });

  it('caps the listing and counts the rest', () => {
    const upcoming: Track[] = Array.from({ length: 12 }, (_, i) => track(`t${i + 1}`));
    const lines = formatQueue({ current: track('now'), upcoming }).split('\n');

    expect(lines[0]).toBe('Now playing: **Song now** by Test Artist (3:20)');
    expect(lines[1]).toBe('Up next:');
    expect(lines[2]).toBe('1. **Song t1** by Test Artist (3:20)');
    expect(lines).toHaveLength(13);
    expect(lines[12]).toBe('...and 2 more');
  });
});

describe('formatNowPlaying', () => {
  it('shows pause state and mode', () => {
    expect(formatNowPlaying({ mode: 'radio', track: track('a'), paused: true })).toBe(
      'Paused **Song a** by Test Artist (3:20) [radio]',
    );
    expect(formatNowPlaying({ mode: 'idle', track: null, paused: false })).toBe('Nothing is playing right now.');
  });
});

describe('formatStations', () => {
  it('lists presets in order', () => {
    const text = formatStations([
      { guildId: 'g', name: 'night', tuning: { description: 'jazz', energy: -1, directions: ['jazz'] } },
      { guildId: 'g', name: 'gym', tuning: { description: 'techno', energy: 2, directions: ['techno'] } },
    ]);
    expect(text).toBe('• night: jazz (energy -1)\n• gym: techno (energy +2)');
  });
});

describe('formatNotice', () => {
  it('describes background events', () => {
    expect(formatNotice({ type: 'idle', guildId: 'g', reason: 'autoplay-finished' })).toBe(
      'Autoplay time is up, stopping.',
    );
    expect(formatNotice({ type: 'idle', guildId: 'g', reason: 'radio-finished' })).toBe('Radio time is up, stopping.');
    expect(formatNotice({ type: 'failed', guildId: 'g', mode: 'radio', error: new NoNewCandidatesError('g') })).toBe(
      'Ran out of new tracks for this station. Try tune, dial or skip.',
    );
    expect(
      formatNotice({ type: 'failed', guildId: 'g', mode: 'manual', error: new PlaybackFailureError(3, 'boom', 'g') }),
    ).toBe('Playback kept failing, so I stopped.');
  });
});
