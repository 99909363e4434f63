export type SessionErrorCode =
  | 'MODE_CONFLICT'
  | 'EMPTY_QUEUE'
  | 'NOT_PLAYING'
  | 'NOT_IN_RADIO'
  | 'NO_NEW_CANDIDATES'
  | 'PRESET_NOT_FOUND'
  | 'CATALOG_UNAVAILABLE'
  | 'PLAYBACK_FAILURE'
  | 'TRACK_NOT_FOUND'
  | 'SESSION_EXPIRED';

/**
 * Base class for every failure a session operation can report.
 * Session state is never left half-updated when one of these is thrown.
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code: SessionErrorCode,
    public guildId?: string,
    public readonly isRetryable: boolean = false,
  ) {
    super(message);
    this.name = 'SessionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ModeConflictError extends SessionError {
  constructor(message: string, guildId?: string) {
    super(message, 'MODE_CONFLICT', guildId);
    this.name = 'ModeConflictError';
  }
}

export class EmptyQueueError extends SessionError {
  constructor(guildId?: string) {
    super('The queue is empty', 'EMPTY_QUEUE', guildId);
    this.name = 'EmptyQueueError';
  }
}

export class NotPlayingError extends SessionError {
  constructor(guildId?: string) {
    super('Nothing is playing', 'NOT_PLAYING', guildId);
    this.name = 'NotPlayingError';
  }
}

export class NotInRadioError extends SessionError {
  constructor(guildId?: string) {
    super('Radio is not running', 'NOT_IN_RADIO', guildId);
    this.name = 'NotInRadioError';
  }
}

export class NoNewCandidatesError extends SessionError {
  constructor(guildId?: string) {
    super('No new tracks left for this selection', 'NO_NEW_CANDIDATES', guildId, true);
    this.name = 'NoNewCandidatesError';
  }
}

export class PresetNotFoundError extends SessionError {
  constructor(public readonly presetName: string, guildId?: string) {
    super(`Station "${presetName}" not found`, 'PRESET_NOT_FOUND', guildId);
    this.name = 'PresetNotFoundError';
  }
}

export class CatalogUnavailableError extends SessionError {
  constructor(cause: unknown, guildId?: string) {
    super(`Track catalog unavailable: ${describeCause(cause)}`, 'CATALOG_UNAVAILABLE', guildId, true);
    this.name = 'CatalogUnavailableError';
  }
}

export class PlaybackFailureError extends SessionError {
  constructor(public readonly attempts: number, cause: unknown, guildId?: string) {
    super(`Playback failed after ${attempts} attempt(s): ${describeCause(cause)}`, 'PLAYBACK_FAILURE', guildId);
    this.name = 'PlaybackFailureError';
  }
}

export class TrackNotFoundError extends SessionError {
  constructor(public readonly query: string, guildId?: string) {
    super(`No results for "${query}"`, 'TRACK_NOT_FOUND', guildId);
    this.name = 'TrackNotFoundError';
  }
}

/** Autoplay or radio ran past its time window; the session is Idle. */
export class SessionExpiredError extends SessionError {
  constructor(public readonly mode: 'autoplay' | 'radio', guildId?: string) {
    super(`${mode === 'autoplay' ? 'Autoplay' : 'Radio'} time is up`, 'SESSION_EXPIRED', guildId);
    this.name = 'SessionExpiredError';
  }
}

/**
 * Raised inside a selection whose session was stopped while it awaited the
 * catalog or the driver. Never reaches callers of the session manager.
 */
export class StaleSelectionError extends Error {
  constructor(public readonly guildId: string) {
    super(`Selection for guild ${guildId} was superseded`);
    this.name = 'StaleSelectionError';
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

export function isStaleSelection(error: unknown): error is StaleSelectionError {
  return error instanceof StaleSelectionError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
