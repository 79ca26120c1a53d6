/**
 * Error taxonomy shared by the store, registry and tools
 *
 * Every error carries a stable `code` that tool handlers pass through
 * to the client in their ToolError result.
 */

export type TimecardErrorCode =
  | 'PERSISTENCE_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_RANGE'
  | 'DECODE_ERROR'
  | 'INVALID_INPUT'
  | 'SESSION_CONFLICT';

export class TimecardError extends Error {
  constructor(
    message: string,
    public readonly code: TimecardErrorCode
  ) {
    super(message);
    this.name = 'TimecardError';
  }
}

/**
 * Storage read or write failed
 */
export class PersistenceError extends TimecardError {
  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}

export class NotFoundError extends TimecardError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * End time earlier than start time
 */
export class InvalidRangeError extends TimecardError {
  constructor(
    public readonly startTime: Date,
    public readonly endTime: Date
  ) {
    super(
      `End time ${endTime.toISOString()} is before start time ${startTime.toISOString()}`,
      'INVALID_RANGE'
    );
    this.name = 'InvalidRangeError';
  }
}

/**
 * A persisted blob could not be parsed back into its shape
 */
export class DecodeError extends TimecardError {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message, 'DECODE_ERROR');
    this.name = 'DecodeError';
  }
}

export class InvalidInputError extends TimecardError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/**
 * The in-progress session was replaced while an operation on it was under way
 */
export class SessionConflictError extends TimecardError {
  constructor(
    public readonly expectedStart: Date,
    public readonly actualStart: Date
  ) {
    super(
      `The work session started at ${expectedStart.toISOString()} was replaced by one started at ${actualStart.toISOString()}`,
      'SESSION_CONFLICT'
    );
    this.name = 'SessionConflictError';
  }
}

export function isTimecardError(error: unknown): error is TimecardError {
  return error instanceof TimecardError;
}

/**
 * Message text for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
