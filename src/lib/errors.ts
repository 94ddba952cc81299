export type SchedulerErrorCode = 'invalid_quality' | 'empty_group' | 'invalid_session_state';

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidQualityError extends SchedulerError {
  readonly value: unknown;

  constructor(value: unknown) {
    super('invalid_quality', `Quality must be an integer from 1 to 5, received ${String(value)}.`);
    this.value = value;
  }
}

export class EmptyGroupError extends SchedulerError {
  constructor(message = 'A question group must contain at least one question.') {
    super('empty_group', message);
  }
}

export class SessionStateError extends SchedulerError {
  constructor(message: string) {
    super('invalid_session_state', message);
  }
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}
