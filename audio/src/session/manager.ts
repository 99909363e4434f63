import { moduleLogger } from '@dialtone/logger';
import type { PlaybackEvent } from '../contracts/playback.js';
import type { Track } from '../contracts/track.js';
import { describeCause, isStaleSelection, type SessionError } from '../errors.js';
import { GuildMutex, guildMutex } from '../guildMutex.js';
import type { Preset } from '../presets/preset.js';
import type { PresetStore } from '../presets/preset-store.js';
import type { DialDirection } from '../radio/tuning.js';
import type { ActiveMode } from '../services/session-metrics.js';
import {
  SessionController,
  type AutoplayStatus,
  type DialReport,
  type IdleReason,
  type NowPlaying,
  type PlayResult,
  type QueueView,
  type SessionDependencies,
  type SignalReport,
  type SkipResult,
  type StaticResult,
} from './controller.js';

const log = moduleLogger('session-manager');

export type SessionNotice =
  | { type: 'trackStarted'; guildId: string; mode: ActiveMode; track: Track }
  | { type: 'idle'; guildId: string; reason: IdleReason }
  | { type: 'failed'; guildId: string; mode: ActiveMode; error: SessionError };

export type NoticeListener = (notice: SessionNotice) => void;

export interface SessionManagerOptions extends Omit<SessionDependencies, 'logger'> {
  presets: PresetStore;
  mutex?: GuildMutex;
}

/**
 * Entry point for every guild session. Commands and driver events for one
 * guild run one at a time through the guild mutex; stop-like commands
 * invalidate in-flight selections before they queue.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionController>();
  private readonly listeners: NoticeListener[] = [];
  private readonly mutex: GuildMutex;

  constructor(private readonly options: SessionManagerOptions) {
    this.mutex = options.mutex ?? guildMutex;
    options.driver.onEvent((event) => {
      void this.dispatch(event);
    });
  }

  onNotice(listener: NoticeListener): void {
    this.listeners.push(listener);
  }

  play(guildId: string, query: string): Promise<PlayResult> {
    return this.run(guildId, (session) => session.play(query));
  }

  skip(guildId: string): Promise<SkipResult> {
    return this.run(guildId, (session) => session.skip());
  }

  stop(guildId: string): Promise<void> {
    this.session(guildId).invalidate();
    return this.run(guildId, (session) => session.stop());
  }

  /** Same effect as stop. */
  clear(guildId: string): Promise<void> {
    return this.stop(guildId);
  }

  pause(guildId: string): Promise<Track> {
    return this.run(guildId, (session) => session.pause());
  }

  resume(guildId: string): Promise<Track> {
    return this.run(guildId, (session) => session.resume());
  }

  queue(guildId: string): Promise<QueueView> {
    return this.run(guildId, (session) => session.queueView());
  }

  nowPlaying(guildId: string): Promise<NowPlaying> {
    return this.run(guildId, (session) => session.nowPlaying());
  }

  autoplay(guildId: string, artist: string): Promise<{ track: Track; deadline: number }> {
    return this.run(guildId, (session) => session.autoplay(artist));
  }

  stopAutoplay(guildId: string): Promise<void> {
    const session = this.session(guildId);
    if (session.mode === 'autoplay') session.invalidate();
    return this.run(guildId, (s) => s.stopAutoplay());
  }

  autoplayStatus(guildId: string): Promise<AutoplayStatus> {
    return this.run(guildId, (session) => session.autoplayStatus());
  }

  radio(guildId: string, description: string): Promise<{ track: Track; signal: SignalReport }> {
    return this.run(guildId, (session) => session.radio(description));
  }

  tune(guildId: string, direction: string): Promise<SignalReport> {
    return this.run(guildId, (session) => session.tune(direction));
  }

  dial(guildId: string, direction: DialDirection): Promise<DialReport> {
    return this.run(guildId, (session) => session.dial(direction));
  }

  static(guildId: string): Promise<StaticResult> {
    return this.run(guildId, (session) => session.static());
  }

  signal(guildId: string): Promise<SignalReport> {
    return this.run(guildId, (session) => session.signal());
  }

  stopRadio(guildId: string): Promise<void> {
    const session = this.session(guildId);
    if (session.mode === 'radio') session.invalidate();
    return this.run(guildId, (s) => s.stopRadio());
  }

  // ---- stations ----

  saveStation(guildId: string, name: string): Promise<Preset> {
    return this.run(guildId, (session) => this.options.presets.save(guildId, name, session.tuningSnapshot()));
  }

  loadStation(guildId: string, name: string): Promise<{ preset: Preset; track: Track; signal: SignalReport }> {
    return this.run(guildId, async (session) => {
      const preset = this.options.presets.load(guildId, name);
      const started = await session.radioFromSnapshot(preset.tuning);
      return { preset, ...started };
    });
  }

  deleteStation(guildId: string, name: string): Promise<void> {
    return this.run(guildId, () => this.options.presets.delete(guildId, name));
  }

  stations(guildId: string): Preset[] {
    return this.options.presets.entries(guildId);
  }

  /** Stops and forgets the guild's session, e.g. when the bot leaves voice. */
  async destroy(guildId: string): Promise<void> {
    await this.stop(guildId);
    this.sessions.delete(guildId);
  }

  modeOf(guildId: string): NowPlaying['mode'] {
    return this.sessions.get(guildId)?.mode ?? 'idle';
  }

  private session(guildId: string): SessionController {
    let session = this.sessions.get(guildId);
    if (!session) {
      const { catalog, driver, now, autoplayDurationMs, radioDurationMs, maxEnergy, retryCap, metrics } = this.options;
      session = new SessionController(guildId, {
        catalog,
        driver,
        now,
        autoplayDurationMs,
        radioDurationMs,
        maxEnergy,
        retryCap,
        metrics,
      });
      this.sessions.set(guildId, session);
    }
    return session;
  }

  private async run<T>(guildId: string, task: (session: SessionController) => Promise<T> | T): Promise<T> {
    try {
      return await this.mutex.run(guildId, () => task(this.session(guildId)));
    } finally {
      this.refreshGauge();
    }
  }

  private async dispatch(event: PlaybackEvent): Promise<void> {
    const { guildId } = event;
    if (!this.sessions.has(guildId)) return;
    try {
      const outcome = await this.run(guildId, (session) => session.handleEvent(event));
      switch (outcome.kind) {
        case 'ignored':
          log.debug({ guildId, trackId: event.trackId, type: event.type }, 'Ignoring stale playback event');
          return;
        case 'started':
          this.emit({ type: 'trackStarted', guildId, mode: outcome.mode, track: outcome.track });
          return;
        case 'idle':
          this.emit({ type: 'idle', guildId, reason: outcome.reason });
          return;
        case 'failed':
          log.warn({ guildId, code: outcome.error.code, mode: outcome.mode }, 'Advance after playback event failed');
          this.emit({ type: 'failed', guildId, mode: outcome.mode, error: outcome.error });
          return;
      }
    } catch (error) {
      if (isStaleSelection(error)) {
        log.debug({ guildId }, 'Selection superseded by a newer command');
        return;
      }
      log.error({ guildId, err: describeCause(error) }, 'Failed to handle playback event');
    }
  }

  private emit(notice: SessionNotice): void {
    for (const listener of this.listeners) {
      try {
        listener(notice);
      } catch (error) {
        log.error({ guildId: notice.guildId, err: describeCause(error) }, 'Notice listener failed');
      }
    }
  }

  private refreshGauge(): void {
    const metrics = this.options.metrics;
    if (!metrics) return;
    const counts: Record<ActiveMode, number> = { manual: 0, autoplay: 0, radio: 0 };
    for (const session of this.sessions.values()) {
      if (session.mode !== 'idle') counts[session.mode] += 1;
    }
    metrics.setActiveSessions(counts);
  }
}
