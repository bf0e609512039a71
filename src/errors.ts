export type EventLoggerErrorCode =
  | 'NO_ACTIVE_EVENT'
  | 'WRITE_FAILURE'
  | 'UNKNOWN_EVENT'
  | 'INVALID_TRANSITION'
  | 'INVALID_TIME_RANGE'
  | 'INVALID_PROJECT_ID';

export class EventLoggerError extends Error {
  constructor(
    message: string,
    public readonly code: EventLoggerErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EventLoggerError';
  }
}

export class NoActiveEventError extends EventLoggerError {
  constructor(message = 'No active event') {
    super(message, 'NO_ACTIVE_EVENT');
    this.name = 'NoActiveEventError';
  }
}

export class WriteFailureError extends EventLoggerError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write to ${filePath}: ${reason}`, 'WRITE_FAILURE', { cause });
    this.name = 'WriteFailureError';
  }
}

export class UnknownEventError extends EventLoggerError {
  constructor(public readonly eventType: string) {
    super(`Unknown event: ${eventType}`, 'UNKNOWN_EVENT');
    this.name = 'UnknownEventError';
  }
}

export class InvalidTransitionError extends EventLoggerError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class InvalidTimeRangeError extends EventLoggerError {
  constructor(message = 'End time must be after start time') {
    super(message, 'INVALID_TIME_RANGE');
    this.name = 'InvalidTimeRangeError';
  }
}

export class InvalidProjectIdError extends EventLoggerError {
  constructor(public readonly projectId: string) {
    super(`Invalid project id "${projectId}" (letters, digits, "-" and "_" only)`, 'INVALID_PROJECT_ID');
    this.name = 'InvalidProjectIdError';
  }
}
