import type { Track } from './track.js';

export type PlaybackEvent =
  | { type: 'finished'; guildId: string; trackId: string }
  | { type: 'error'; guildId: string; trackId: string; cause: string };

export type PlaybackListener = (event: PlaybackEvent) => void;

export interface PlaybackDriver {
  /** Resolves once the backend acknowledged the start; rejects when it refused. */
  start(guildId: string, track: Track): Promise<void>;
  pause(guildId: string): Promise<void>;
  resume(guildId: string): Promise<void>;
  halt(guildId: string): Promise<void>;
  onEvent(listener: PlaybackListener): void;
}
