/**
 * Status of a single time record
 */
export type RecordStatus = 'running' | 'paused' | 'completed';

/**
 * Kinds of sub-events logged against a record
 */
export type SegmentEventKind = 'start' | 'pause' | 'resume' | 'end';

/**
 * A moment in the life of a record. Active time is the sum of the
 * intervals that begin at `start`/`resume` and close at `pause`/`end`.
 */
export interface SegmentEvent {
  kind: SegmentEventKind;
  at: Date;
}

/**
 * Represents one logged interval of tracked activity
 */
export interface TimeRecord {
  taskLabel: string;
  startTime: Date;
  endTime?: Date;
  status: RecordStatus;
  events: SegmentEvent[];
}

/**
 * The current activity plus everything recorded before it
 */
export interface Session {
  activeRecord: TimeRecord | null;
  history: TimeRecord[];
}

/**
 * Session state values, derived from the Session contents
 */
export type SessionState = 'idle' | 'running' | 'paused' | 'ended';

/**
 * Actions a caller can apply to a Session
 */
export type SessionAction = 'start' | 'switch' | 'pause' | 'resume' | 'end';

export function emptySession(): Session {
  return { activeRecord: null, history: [] };
}

/**
 * Base error class for tock
 */
export class TockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when input fails validation
 */
export class ValidationError extends TockError {}

/**
 * Error thrown when an action is not allowed in the current state
 */
export class InvalidTransitionError extends TockError {
  constructor(
    readonly state: SessionState,
    readonly action: SessionAction,
    readonly allowed: readonly SessionAction[]
  ) {
    super(
      `Cannot ${action} while ${state}. ` +
        (allowed.length > 0 ? `Allowed: ${allowed.join(', ')}.` : 'No actions allowed.')
    );
  }
}

/**
 * Error thrown when the backing store cannot be read or parsed
 */
export class CorruptStoreError extends TockError {
  constructor(
    readonly path: string,
    detail: string
  ) {
    super(
      `Store at ${path} is corrupt: ${detail}. ` +
        `Back up the file and remove it to start with an empty store.`
    );
  }
}

/**
 * Error thrown when the backing store cannot be written
 */
export class StoreWriteError extends TockError {
  constructor(
    readonly path: string,
    detail: string
  ) {
    super(`Failed to write store at ${path}: ${detail}`);
  }
}

/**
 * Error thrown when configuration cannot be loaded, validated or written
 */
export class ConfigError extends TockError {}
