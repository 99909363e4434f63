export type { Track } from './contracts/track.js';
export type { CatalogClient, Steering, SteeringIntent } from './contracts/catalog.js';
export type { PlaybackDriver, PlaybackEvent, PlaybackListener } from './contracts/playback.js';
export * from './errors.js';
export { GuildMutex, guildMutex } from './guildMutex.js';

export { TrackQueue } from './session/queue.js';
export { PlayHistory } from './session/history.js';
export {
  SessionController,
  DEFAULT_AUTOPLAY_DURATION_MS,
  DEFAULT_RADIO_DURATION_MS,
  DEFAULT_RETRY_CAP,
  type AutoplayStatus,
  type DialReport,
  type EventOutcome,
  type IdleReason,
  type NowPlaying,
  type PlayResult,
  type QueueView,
  type QueuedTrack,
  type SessionDependencies,
  type SessionMode,
  type SignalReport,
  type SkipResult,
  type StaticResult,
} from './session/controller.js';
export { SessionManager, type NoticeListener, type SessionManagerOptions, type SessionNotice } from './session/manager.js';

export { Tuning, DEFAULT_MAX_ENERGY, type DialDirection, type EnergyBounds, type TuningSnapshot } from './radio/tuning.js';
export { normalizeTitle } from './radio/normalize.js';
export { isLikelySong } from './radio/song-filter.js';
export { buildArtistQuery, buildRadioQuery, energyModifier, steeringQuery } from './radio/steering.js';
export { autoplayLadder, radioLadder, selectCandidate } from './radio/selection.js';

export { PresetStore } from './presets/preset-store.js';
export { normalizePresetName, tuningSnapshotSchema, type Preset } from './presets/preset.js';
export type { PresetRepository } from './presets/repository.js';
export { FilePresetRepository } from './presets/file-preset-repository.js';
export { RedisPresetRepository } from './presets/redis-preset-repository.js';

export { SessionMetrics, type ActiveMode } from './services/session-metrics.js';

export { LavalinkTrackCache, toTrack, type LavalinkTrackLike } from './lavalink/track-cache.js';
export { LavalinkCatalogClient, relatedMixUrl, type LavalinkCatalogOptions, type LavalinkSearchNode } from './lavalink/catalog.js';
export { LavalinkPlaybackDriver, type LavalinkPlayerLike } from './lavalink/driver.js';
export {
  createLavalinkManager,
  waitForLavalinkRestReady,
  type LavalinkConnection,
  type SendToShardFn,
} from './lavalink/manager.js';
