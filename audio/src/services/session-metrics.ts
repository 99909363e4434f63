import { Counter, Gauge, Registry } from 'prom-client';

export type ActiveMode = 'manual' | 'autoplay' | 'radio';

/**
 * Session counters for the `/metrics` endpoint. Each instance owns its
 * registry so tests can build one without touching global state.
 */
export class SessionMetrics {
  readonly registry: Registry;
  private readonly tracksStarted: Counter<'mode'>;
  private readonly selectionFailures: Counter<'mode' | 'code'>;
  private readonly playbackFailures: Counter<'mode'>;
  private readonly activeSessions: Gauge<'mode'>;

  constructor(registry?: Registry) {
    this.registry = registry || new Registry();

    this.tracksStarted = new Counter({
      name: 'dialtone_tracks_started_total',
      help: 'Tracks acknowledged by the playback driver',
      labelNames: ['mode'],
      registers: [this.registry],
    });

    this.selectionFailures = new Counter({
      name: 'dialtone_selection_failures_total',
      help: 'Selections that ended without a track',
      labelNames: ['mode', 'code'],
      registers: [this.registry],
    });

    this.playbackFailures = new Counter({
      name: 'dialtone_playback_failures_total',
      help: 'Driver start rejections and track errors',
      labelNames: ['mode'],
      registers: [this.registry],
    });

    this.activeSessions = new Gauge({
      name: 'dialtone_active_sessions',
      help: 'Guild sessions per non-idle mode',
      labelNames: ['mode'],
      registers: [this.registry],
    });
  }

  trackStarted(mode: ActiveMode): void {
    this.tracksStarted.inc({ mode });
  }

  selectionFailed(mode: ActiveMode, code: string): void {
    this.selectionFailures.inc({ mode, code });
  }

  playbackFailed(mode: ActiveMode): void {
    this.playbackFailures.inc({ mode });
  }

  setActiveSessions(counts: Record<ActiveMode, number>): void {
    for (const mode of ['manual', 'autoplay', 'radio'] as const) {
      this.activeSessions.set({ mode }, counts[mode]);
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
