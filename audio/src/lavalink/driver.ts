import { moduleLogger } from '@dialtone/logger';
import type { PlaybackDriver, PlaybackEvent, PlaybackListener } from '../contracts/playback.js';
import type { Track } from '../contracts/track.js';
import type { LavalinkTrackCache, LavalinkTrackLike } from './track-cache.js';

const log = moduleLogger('lavalink:driver');

export interface LavalinkPlayerLike<T extends LavalinkTrackLike> {
  play(options: { clientTrack: T }): Promise<unknown>;
  pause(): Promise<unknown>;
  resume(): Promise<unknown>;
  stopPlaying(clearQueue: boolean, executeAutoplay: boolean): Promise<unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

function identifierOf(track: unknown): string | undefined {
  if (!isRecord(track)) return undefined;
  const info = track.info;
  if (!isRecord(info)) return undefined;
  const id = info.identifier;
  return typeof id === 'string' ? id : undefined;
}

function reasonOf(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  const reason = payload.reason;
  return typeof reason === 'string' ? reason : undefined;
}

function exceptionOf(payload: unknown): string {
  const exception = isRecord(payload) ? payload.exception : undefined;
  if (isRecord(exception)) {
    const { message, cause } = exception;
    if (typeof message === 'string' && message) return message;
    if (typeof cause === 'string' && cause) return cause;
  }
  return 'unknown playback error';
}

/**
 * PlaybackDriver over lavalink-client players. The bot wires the manager's
 * trackEnd, trackError and trackStuck events into the handle* methods.
 */
export class LavalinkPlaybackDriver<T extends LavalinkTrackLike> implements PlaybackDriver {
  private readonly listeners: PlaybackListener[] = [];

  constructor(
    private readonly resolvePlayer: (guildId: string) => LavalinkPlayerLike<T> | undefined,
    private readonly cache: LavalinkTrackCache<T>,
  ) {}

  async start(guildId: string, track: Track): Promise<void> {
    const player = this.requirePlayer(guildId);
    const resolved = this.cache.get(track.id);
    if (!resolved) throw new Error(`Track ${track.id} is no longer resolvable`);
    await player.play({ clientTrack: resolved });
  }

  async pause(guildId: string): Promise<void> {
    await this.requirePlayer(guildId).pause();
  }

  async resume(guildId: string): Promise<void> {
    await this.requirePlayer(guildId).resume();
  }

  async halt(guildId: string): Promise<void> {
    const player = this.resolvePlayer(guildId);
    if (!player) return;
    await player.stopPlaying(true, false);
  }

  onEvent(listener: PlaybackListener): void {
    this.listeners.push(listener);
  }

  /** Only natural ends and load failures advance; replaced/stopped/cleanup come from our own calls. */
  handleTrackEnd(guildId: string, track: unknown, payload: unknown): void {
    const trackId = identifierOf(track);
    if (!trackId) return;
    const reason = reasonOf(payload);
    if (reason === 'finished') {
      this.emit({ type: 'finished', guildId, trackId });
    } else if (reason === 'loadFailed') {
      this.emit({ type: 'error', guildId, trackId, cause: 'load failed' });
    } else {
      log.debug({ guildId, trackId, reason }, 'Track end without advance');
    }
  }

  handleTrackError(guildId: string, track: unknown, payload: unknown): void {
    const trackId = identifierOf(track);
    if (!trackId) return;
    this.emit({ type: 'error', guildId, trackId, cause: exceptionOf(payload) });
  }

  handleTrackStuck(guildId: string, track: unknown): void {
    const trackId = identifierOf(track);
    if (!trackId) return;
    this.emit({ type: 'error', guildId, trackId, cause: 'track stuck' });
  }

  private requirePlayer(guildId: string): LavalinkPlayerLike<T> {
    const player = this.resolvePlayer(guildId);
    if (!player) throw new Error(`No voice connection for guild ${guildId}`);
    return player;
  }

  private emit(event: PlaybackEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
