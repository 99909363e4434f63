import type {
  AutoplayStatus,
  IdleReason,
  NowPlaying,
  PlayResult,
  Preset,
  QueueView,
  SessionNotice,
  SignalReport,
  Track,
} from '@dialtone/audio';
import { helpLines } from './commands/parser.js';

export const QUEUE_VIEW_LIMIT = 10;

export function formatDuration(ms: number): string {
  if (ms <= 0) return 'live';
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = String(totalSeconds % 60).padStart(2, '0');
  return hours > 0 ? `${hours}:${String(minutes).padStart(2, '0')}:${seconds}` : `${minutes}:${seconds}`;
}

export function formatTrack(track: Track): string {
  return `**${track.title}** by ${track.artist} (${formatDuration(track.durationMs)})`;
}

export function formatPlayResult(result: PlayResult): string {
  const lines: string[] = [];
  if (result.started) lines.push(`Now playing ${formatTrack(result.started)}`);
  const [first] = result.queued;
  if (result.queued.length === 1 && first) {
    lines.push(`Queued ${formatTrack(first.track)} at position ${first.position}`);
  } else if (result.queued.length > 1) {
    lines.push(`Queued ${result.queued.length} tracks`);
  }
  return lines.join('\n');
}

/** Current track plus the first entries of the queue; longer queues end in "...and N more". */
export function formatQueue(view: QueueView, limit = QUEUE_VIEW_LIMIT): string {
  if (!view.current && view.upcoming.length === 0) return 'The queue is empty.';
  const lines: string[] = [];
  if (view.current) lines.push(`Now playing: ${formatTrack(view.current)}`);
  if (view.upcoming.length === 0) {
    lines.push('Nothing queued.');
    return lines.join('\n');
  }
  lines.push('Up next:');
  view.upcoming.slice(0, limit).forEach((track, index) => lines.push(`${index + 1}. ${formatTrack(track)}`));
  const hidden = view.upcoming.length - limit;
  if (hidden > 0) lines.push(`...and ${hidden} more`);
  return lines.join('\n');
}

export function formatNowPlaying(np: NowPlaying): string {
  if (!np.track) return np.mode === 'idle' ? 'Nothing is playing right now.' : `Nothing is playing (${np.mode} is waiting).`;
  return `${np.paused ? 'Paused' : 'Now playing'} ${formatTrack(np.track)} [${np.mode}]`;
}

function formatEnergy(energy: number): string {
  return energy > 0 ? `+${energy}` : String(energy);
}

export function formatSignal(report: SignalReport): string {
  return [
    `Station: ${report.description}`,
    `Energy: ${formatEnergy(report.energy)} (${formatEnergy(report.bounds.min)} to ${formatEnergy(report.bounds.max)})`,
    `Tracks played: ${report.elapsed}`,
    `Directions (${report.directionCount}): ${report.directions.join(' → ')}`,
    `Time left: ${Math.ceil(report.remainingMs / 60_000)} min`,
  ].join('\n');
}

export function formatStations(presets: Preset[]): string {
  if (presets.length === 0) return 'No saved stations yet. Save one with station save <name>.';
  return presets
    .map((p) => `• ${p.name}: ${p.tuning.description} (energy ${formatEnergy(p.tuning.energy)})`)
    .join('\n');
}

export function formatAutoplayStatus(status: AutoplayStatus): string {
  const minutes = Math.ceil(status.remainingMs / 60_000);
  const lines = [`Autoplay: ${status.artist}`, `Songs so far: ${status.elapsed}`, `Time left: ${minutes} min`];
  if (status.track) lines.push(`Now playing ${formatTrack(status.track)}`);
  return lines.join('\n');
}

/** Text for events that happen without a command, or null when there is nothing worth posting. */
const IDLE_NOTICES: Record<IdleReason, string> = {
  'queue-finished': 'Queue finished.',
  'autoplay-finished': 'Autoplay time is up, stopping.',
  'radio-finished': 'Radio time is up, stopping.',
};

export function formatNotice(notice: SessionNotice): string | null {
  switch (notice.type) {
    case 'trackStarted':
      return `Now playing ${formatTrack(notice.track)}`;
    case 'idle':
      return IDLE_NOTICES[notice.reason];
    case 'failed':
      return notice.error.code === 'PLAYBACK_FAILURE'
        ? 'Playback kept failing, so I stopped.'
        : notice.error.code === 'NO_NEW_CANDIDATES'
          ? 'Ran out of new tracks for this station. Try tune, dial or skip.'
          : `Could not pick the next track: ${notice.error.message}`;
  }
}

export function help(prefix: string): string {
  return ['**Commands**', ...helpLines(prefix).map((line) => `\`${line}\``)].join('\n');
}
