import { moduleLogger, type Logger } from '@dialtone/logger';
import type { CatalogClient, Steering } from '../contracts/catalog.js';
import type { PlaybackDriver, PlaybackEvent } from '../contracts/playback.js';
import type { Track } from '../contracts/track.js';
import {
  CatalogUnavailableError,
  EmptyQueueError,
  ModeConflictError,
  NotInRadioError,
  NotPlayingError,
  PlaybackFailureError,
  SessionError,
  SessionExpiredError,
  StaleSelectionError,
  TrackNotFoundError,
  describeCause,
} from '../errors.js';
import { autoplayLadder, radioLadder, selectCandidate } from '../radio/selection.js';
import { Tuning, type DialDirection, type EnergyBounds, type TuningSnapshot } from '../radio/tuning.js';
import type { ActiveMode, SessionMetrics } from '../services/session-metrics.js';
import { PlayHistory } from './history.js';
import { TrackQueue } from './queue.js';

export type SessionMode = 'idle' | ActiveMode;

type ModeState =
  | { mode: 'idle' }
  | { mode: 'manual'; queue: TrackQueue }
  | { mode: 'autoplay'; artist: string; startedAt: number; deadline: number; elapsed: number }
  | { mode: 'radio'; tuning: Tuning; played: number; startedAt: number; deadline: number; steered: boolean };

export const DEFAULT_AUTOPLAY_DURATION_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_RADIO_DURATION_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_RETRY_CAP = 3;

export interface SessionDependencies {
  catalog: CatalogClient;
  driver: PlaybackDriver;
  now?: () => number;
  autoplayDurationMs?: number;
  radioDurationMs?: number;
  maxEnergy?: number;
  retryCap?: number;
  metrics?: SessionMetrics;
  logger?: Logger;
}

export interface QueuedTrack {
  track: Track;
  position: number;
}

export interface PlayResult {
  started: Track | null;
  queued: QueuedTrack[];
}

export interface SkipResult {
  skipped: Track | null;
  track: Track;
}

export interface StaticResult {
  avoided: Track;
  track: Track;
}

export interface SignalReport {
  description: string;
  energy: number;
  elapsed: number;
  directionCount: number;
  directions: string[];
  bounds: EnergyBounds;
  remainingMs: number;
}

export interface DialReport extends SignalReport {
  /** False when energy was already at the bound in that direction. */
  changed: boolean;
}

export interface AutoplayStatus {
  artist: string;
  elapsed: number;
  remainingMs: number;
  track: Track | null;
}

export interface NowPlaying {
  mode: SessionMode;
  track: Track | null;
  paused: boolean;
}

export interface QueueView {
  current: Track | null;
  upcoming: Track[];
}

export type IdleReason = 'queue-finished' | 'autoplay-finished' | 'radio-finished';

export type EventOutcome =
  | { kind: 'ignored' }
  | { kind: 'started'; mode: ActiveMode; track: Track }
  | { kind: 'idle'; reason: IdleReason }
  | { kind: 'failed'; mode: ActiveMode; error: SessionError };

type Checkpoint = () => void;
type NextTrack = (rejected: ReadonlySet<string>) => Promise<Track | null>;

const NO_AVOID: ReadonlySet<string> = new Set();

/**
 * Playback session of one guild. Callers serialize access per guild; every
 * operation computes its result against tentative state and commits only once
 * the driver acknowledged the start.
 */
export class SessionController {
  private state: ModeState = { mode: 'idle' };
  private current: Track | null = null;
  private paused = false;
  private readonly history = new PlayHistory();
  private generation = 0;
  private failures = 0;

  private readonly now: () => number;
  private readonly autoplayDurationMs: number;
  private readonly radioDurationMs: number;
  private readonly maxEnergy: number | undefined;
  private readonly retryCap: number;
  private readonly log: Logger;

  constructor(
    readonly guildId: string,
    private readonly deps: SessionDependencies,
  ) {
    this.now = deps.now ?? Date.now;
    this.autoplayDurationMs = deps.autoplayDurationMs ?? DEFAULT_AUTOPLAY_DURATION_MS;
    this.radioDurationMs = deps.radioDurationMs ?? DEFAULT_RADIO_DURATION_MS;
    this.maxEnergy = deps.maxEnergy;
    this.retryCap = deps.retryCap ?? DEFAULT_RETRY_CAP;
    this.log = (deps.logger ?? moduleLogger('session')).child({ guildId });
  }

  get mode(): SessionMode {
    return this.state.mode;
  }

  /** Discards any selection already in flight. Call before queueing a stop. */
  invalidate(): void {
    this.generation += 1;
  }

  // ---- manual ----

  async play(query: string): Promise<PlayResult> {
    if (this.state.mode === 'autoplay' || this.state.mode === 'radio') {
      throw new ModeConflictError(`Cannot queue tracks while ${this.state.mode} is running`, this.guildId);
    }
    const checkpoint = this.checkpointer();
    const found = await this.search(query, checkpoint);
    if (found.length === 0) throw new TrackNotFoundError(query, this.guildId);

    const queue = this.tentativeQueue();
    for (const track of found) queue.enqueue(track);

    let started: Track | null = null;
    if (!this.current) {
      started = await this.launchOrIdle('manual', async () => (queue.size > 0 ? queue.dequeue() : null), checkpoint);
    }

    this.state = { mode: 'manual', queue };
    if (started) this.commitStart(started, 'manual');

    const upcoming = queue.peek();
    const queued: QueuedTrack[] = [];
    upcoming.forEach((track, index) => {
      if (found.includes(track)) queued.push({ track, position: index + 1 });
    });
    this.log.info({ query, found: found.length, started: started?.id }, 'session: play');
    return { started, queued };
  }

  queueView(): QueueView {
    return {
      current: this.current,
      upcoming: this.state.mode === 'manual' ? this.state.queue.peek() : [],
    };
  }

  // ---- any mode ----

  async skip(): Promise<SkipResult> {
    if (this.state.mode === 'idle') throw new NotPlayingError(this.guildId);
    await this.stopIfExpired();
    const skipped = this.current;

    if (this.state.mode === 'manual' && this.state.queue.size === 0) {
      await this.stopAll();
      throw new EmptyQueueError(this.guildId);
    }

    const track = await this.advance(this.checkpointer(), NO_AVOID);
    if (!track) throw new EmptyQueueError(this.guildId);
    return { skipped, track };
  }

  /** Idle from any state; clears every piece of mode state and halts the driver. */
  async stop(): Promise<void> {
    this.invalidate();
    await this.stopAll();
  }

  async pause(): Promise<Track> {
    const track = this.requireCurrent();
    if (this.paused) return track;
    await this.deps.driver.pause(this.guildId);
    this.paused = true;
    return track;
  }

  async resume(): Promise<Track> {
    const track = this.requireCurrent();
    if (!this.paused) return track;
    await this.deps.driver.resume(this.guildId);
    this.paused = false;
    return track;
  }

  nowPlaying(): NowPlaying {
    return { mode: this.state.mode, track: this.current, paused: this.paused };
  }

  // ---- autoplay ----

  async autoplay(artist: string): Promise<{ track: Track; deadline: number }> {
    if (this.state.mode !== 'idle') {
      throw new ModeConflictError(`Cannot start autoplay while ${this.state.mode} is running`, this.guildId);
    }
    const checkpoint = this.checkpointer();
    const startedAt = this.now();
    this.history.clear();
    this.failures = 0;

    const track = await this.launch('autoplay', this.selector(autoplayLadder(artist), false, checkpoint, 'autoplay'), checkpoint);
    if (!track) throw new StaleSelectionError(this.guildId);

    const deadline = startedAt + this.autoplayDurationMs;
    this.state = { mode: 'autoplay', artist, startedAt, deadline, elapsed: 0 };
    this.commitStart(track, 'autoplay');
    this.log.info({ artist, deadline }, 'session: autoplay started');
    return { track, deadline };
  }

  async stopAutoplay(): Promise<void> {
    if (this.state.mode !== 'autoplay') {
      throw new ModeConflictError('Autoplay is not running', this.guildId);
    }
    await this.stop();
  }

  autoplayStatus(): AutoplayStatus {
    if (this.state.mode !== 'autoplay') {
      throw new ModeConflictError('Autoplay is not running', this.guildId);
    }
    return {
      artist: this.state.artist,
      elapsed: this.state.elapsed,
      remainingMs: Math.max(0, this.state.deadline - this.now()),
      track: this.current,
    };
  }

  // ---- radio ----

  async radio(description: string): Promise<{ track: Track; signal: SignalReport }> {
    return this.startRadio(Tuning.start(description, this.maxEnergy));
  }

  /** Radio from a saved tuning; energy is clamped to this session's bounds. */
  async radioFromSnapshot(snapshot: TuningSnapshot): Promise<{ track: Track; signal: SignalReport }> {
    return this.startRadio(Tuning.fromSnapshot(snapshot, this.maxEnergy));
  }

  tune(direction: string): SignalReport {
    const radio = this.requireRadio();
    radio.tuning.tune(direction);
    radio.steered = true;
    return this.signal();
  }

  dial(direction: DialDirection): DialReport {
    const radio = this.requireRadio();
    const changed = radio.tuning.dial(direction);
    if (changed) radio.steered = true;
    return { ...this.signal(), changed };
  }

  async static(): Promise<StaticResult> {
    this.requireRadio();
    await this.stopIfExpired();
    const avoided = this.requireCurrent();
    const track = await this.advance(this.checkpointer(), new Set([avoided.id]));
    if (!track) throw new StaleSelectionError(this.guildId);
    return { avoided, track };
  }

  signal(): SignalReport {
    const radio = this.requireRadio();
    const { tuning } = radio;
    return {
      description: tuning.currentDescription,
      energy: tuning.currentEnergy,
      elapsed: radio.played,
      directionCount: tuning.directionHistory.length,
      directions: [...tuning.directionHistory],
      bounds: { ...tuning.bounds },
      remainingMs: Math.max(0, radio.deadline - this.now()),
    };
  }

  tuningSnapshot(): TuningSnapshot {
    return this.requireRadio().tuning.snapshot();
  }

  async stopRadio(): Promise<void> {
    this.requireRadio();
    await this.stop();
  }

  // ---- driver events ----

  async handleEvent(event: PlaybackEvent): Promise<EventOutcome> {
    if (!this.current || this.current.id !== event.trackId || this.state.mode === 'idle') {
      return { kind: 'ignored' };
    }
    const mode = this.state.mode;

    if (event.type === 'finished') {
      this.failures = 0;
    } else {
      this.failures += 1;
      this.deps.metrics?.playbackFailed(mode);
      this.log.warn({ trackId: event.trackId, cause: event.cause, failures: this.failures }, 'session: track error');
      if (this.failures >= this.retryCap) {
        const error = new PlaybackFailureError(this.failures, event.cause, this.guildId);
        await this.goIdleAfterFailure();
        return { kind: 'failed', mode, error };
      }
    }

    if (this.state.mode === 'manual' && this.state.queue.size === 0) {
      this.reset();
      return { kind: 'idle', reason: 'queue-finished' };
    }
    const expired = this.expiredMode();
    if (expired) {
      this.log.info({ mode: expired }, 'session: deadline reached');
      this.reset();
      return { kind: 'idle', reason: expired === 'autoplay' ? 'autoplay-finished' : 'radio-finished' };
    }

    const finished = this.current;
    try {
      const track = await this.advance(this.checkpointer(), NO_AVOID);
      if (!track) return { kind: 'idle', reason: 'queue-finished' };
      return { kind: 'started', mode, track };
    } catch (error) {
      if (error instanceof PlaybackFailureError) return { kind: 'failed', mode, error };
      if (error instanceof SessionError) {
        // The finished track is gone; the mode stays so the user can skip or retune.
        if (this.current === finished) this.current = null;
        return { kind: 'failed', mode, error };
      }
      throw error;
    }
  }

  // ---- internals ----

  private async startRadio(tuning: Tuning): Promise<{ track: Track; signal: SignalReport }> {
    if (this.state.mode !== 'idle') {
      throw new ModeConflictError(`Cannot start radio while ${this.state.mode} is running`, this.guildId);
    }
    const checkpoint = this.checkpointer();
    const startedAt = this.now();
    this.history.clear();
    this.failures = 0;

    const steering = this.radioSteering(tuning, NO_AVOID, null);
    const track = await this.launch('radio', this.selector(radioLadder(steering), true, checkpoint, 'radio'), checkpoint);
    if (!track) throw new StaleSelectionError(this.guildId);

    const deadline = startedAt + this.radioDurationMs;
    this.state = { mode: 'radio', tuning, played: 0, startedAt, deadline, steered: false };
    this.commitStart(track, 'radio');
    this.log.info({ description: tuning.currentDescription, energy: tuning.currentEnergy }, 'session: radio started');
    return { track, signal: this.signal() };
  }

  /** Next track for the active mode; null only when a manual queue ran dry. */
  private async advance(checkpoint: Checkpoint, avoid: ReadonlySet<string>): Promise<Track | null> {
    const state = this.state;
    switch (state.mode) {
      case 'idle':
        throw new NotPlayingError(this.guildId);
      case 'manual': {
        const queue = this.tentativeQueue();
        const track = await this.launchOrIdle('manual', async () => (queue.size > 0 ? queue.dequeue() : null), checkpoint);
        state.queue = queue;
        if (track) this.commitStart(track, 'manual');
        else this.reset();
        return track;
      }
      case 'autoplay': {
        const next = this.selector(autoplayLadder(state.artist), false, checkpoint, 'autoplay');
        const track = await this.launchOrIdle('autoplay', next, checkpoint);
        if (!track) return null;
        state.elapsed += 1;
        this.commitStart(track, 'autoplay');
        return track;
      }
      case 'radio': {
        // Tracks similar to the current one, unless it was just avoided or the listener steered away from it.
        const seed = this.current && !state.steered && !avoid.has(this.current.id) ? this.current : null;
        const steering = this.radioSteering(state.tuning, avoid, seed);
        const next = this.selector(radioLadder(steering), true, checkpoint, 'radio');
        const track = await this.launchOrIdle('radio', next, checkpoint);
        if (!track) return null;
        this.commitStart(track, 'radio');
        return track;
      }
    }
  }

  private radioSteering(tuning: Tuning, avoid: ReadonlySet<string>, seed: Track | null): Steering {
    const steering: Steering = {
      intent: 'radio',
      description: tuning.currentDescription,
      energy: tuning.currentEnergy,
      avoid,
    };
    if (seed) steering.seed = seed;
    return steering;
  }

  private selector(ladder: Steering[], songsOnly: boolean, checkpoint: Checkpoint, mode: ActiveMode): NextTrack {
    return async (rejected) => {
      try {
        return await selectCandidate(this.deps.catalog, ladder, {
          isPlayed: (track) => this.history.has(track) || rejected.has(track.id),
          songsOnly,
          checkpoint,
          guildId: this.guildId,
        });
      } catch (error) {
        if (error instanceof SessionError) {
          this.deps.metrics?.selectionFailed(mode, error.code);
          this.log.warn({ code: error.code, err: error.message }, 'session: selection failed');
        }
        throw error;
      }
    };
  }

  /**
   * Starts the first track `next` yields. A rejected start counts as a
   * playback failure and moves on; the cap of consecutive failures ends in
   * PlaybackFailureError.
   */
  private async launch(mode: ActiveMode, next: NextTrack, checkpoint: Checkpoint): Promise<Track | null> {
    const rejected = new Set<string>();
    let failures = this.failures;
    let lastError: unknown;

    for (;;) {
      const track = await next(rejected);
      if (!track) {
        if (rejected.size > 0) throw new PlaybackFailureError(failures, lastError, this.guildId);
        return null;
      }
      try {
        await this.deps.driver.start(this.guildId, track);
      } catch (error) {
        checkpoint();
        failures += 1;
        lastError = error;
        this.deps.metrics?.playbackFailed(mode);
        this.log.warn({ trackId: track.id, err: describeCause(error), failures }, 'session: start rejected');
        if (failures >= this.retryCap) throw new PlaybackFailureError(failures, error, this.guildId);
        rejected.add(track.id);
        continue;
      }
      checkpoint();
      this.failures = failures;
      return track;
    }
  }

  /** launch() that leaves the session Idle when playback failures exhaust the cap. */
  private async launchOrIdle(mode: ActiveMode, next: NextTrack, checkpoint: Checkpoint): Promise<Track | null> {
    try {
      return await this.launch(mode, next, checkpoint);
    } catch (error) {
      if (error instanceof PlaybackFailureError) await this.goIdleAfterFailure();
      throw error;
    }
  }

  private commitStart(track: Track, mode: ActiveMode): void {
    this.current = track;
    this.paused = false;
    this.history.add(track);
    if (this.state.mode === 'radio') {
      this.state.played += 1;
      this.state.steered = false;
    }
    this.deps.metrics?.trackStarted(mode);
    this.log.info({ trackId: track.id, title: track.title, mode }, 'session: track started');
  }

  private async search(query: string, checkpoint: Checkpoint): Promise<Track[]> {
    let found: Track[];
    try {
      found = await this.deps.catalog.search(query);
    } catch (error) {
      checkpoint();
      throw new CatalogUnavailableError(error, this.guildId);
    }
    checkpoint();
    return found;
  }

  private tentativeQueue(): TrackQueue {
    const queue = new TrackQueue();
    if (this.state.mode === 'manual') {
      for (const track of this.state.queue.peek()) queue.enqueue(track);
    }
    return queue;
  }

  private checkpointer(): Checkpoint {
    const issuedFor = this.generation;
    return () => {
      if (this.generation !== issuedFor) throw new StaleSelectionError(this.guildId);
    };
  }

  private requireCurrent(): Track {
    if (this.state.mode === 'idle' || !this.current) throw new NotPlayingError(this.guildId);
    return this.current;
  }

  private requireRadio(): Extract<ModeState, { mode: 'radio' }> {
    if (this.state.mode !== 'radio') throw new NotInRadioError(this.guildId);
    return this.state;
  }

  private reset(): void {
    this.state = { mode: 'idle' };
    this.current = null;
    this.paused = false;
    this.history.clear();
    this.failures = 0;
  }

  private expiredMode(): 'autoplay' | 'radio' | null {
    const state = this.state;
    if ((state.mode === 'autoplay' || state.mode === 'radio') && this.now() >= state.deadline) return state.mode;
    return null;
  }

  /** Ends an autoplay or radio session whose time is up before it picks another track. */
  private async stopIfExpired(): Promise<void> {
    const expired = this.expiredMode();
    if (!expired) return;
    this.log.info({ mode: expired }, 'session: deadline reached');
    await this.stopAll();
    throw new SessionExpiredError(expired, this.guildId);
  }

  private async stopAll(): Promise<void> {
    this.reset();
    await this.deps.driver.halt(this.guildId);
  }

  private async goIdleAfterFailure(): Promise<void> {
    this.invalidate();
    this.reset();
    try {
      await this.deps.driver.halt(this.guildId);
    } catch (error) {
      this.log.warn({ err: describeCause(error) }, 'session: halt after playback failure failed');
    }
  }
}
