import { isSessionError, isStaleSelection, type SessionErrorCode } from '@dialtone/audio';
import { moduleLogger } from '@dialtone/logger';
import { CommandUsageError } from './commands/parser.js';

const log = moduleLogger('gateway:errors');

export const GENERIC_FAILURE = 'Something went wrong. Please try again in a moment.';

const SESSION_MESSAGES: Record<SessionErrorCode, (message: string) => string> = {
  MODE_CONFLICT: (message) => `${message}.`,
  EMPTY_QUEUE: () => 'The queue is empty, stopping playback.',
  NOT_PLAYING: () => 'Nothing is playing right now.',
  NOT_IN_RADIO: () => 'That only works while the radio is on. Start it with radio <description>.',
  NO_NEW_CANDIDATES: () => 'Could not find anything new for this station. Try tune or dial.',
  PRESET_NOT_FOUND: (message) => `${message}.`,
  CATALOG_UNAVAILABLE: () => 'The music catalog is unavailable right now. Please try again.',
  PLAYBACK_FAILURE: () => 'Playback kept failing, so I stopped.',
  TRACK_NOT_FOUND: (message) => `${message}.`,
  SESSION_EXPIRED: (message) => `${message}, stopping playback.`,
};

/**
 * User-facing line for any error a command can raise. Unexpected errors are
 * logged here and answered with a generic message.
 */
export function describeError(error: unknown, context: Record<string, unknown> = {}): string {
  if (error instanceof CommandUsageError) {
    return `${error.message}. Usage: \`${error.usage}\``;
  }
  if (isStaleSelection(error)) {
    return 'Cancelled by a newer command.';
  }
  if (isSessionError(error)) {
    log.debug({ ...context, code: error.code }, 'Command rejected');
    return SESSION_MESSAGES[error.code](error.message);
  }
  log.error({ ...context, err: error instanceof Error ? error.message : String(error) }, 'Command failed');
  return GENERIC_FAILURE;
}
