/**
 * Error types map one-to-one onto the HTTP status returned to the caller
 */
export enum ErrorType {
  USER = 'user', // 400
  NOT_FOUND = 'not_found', // 404
  SYSTEM = 'system', // 500
}

export function mapErrorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case ErrorType.USER:
      return 400;
    case ErrorType.NOT_FOUND:
      return 404;
    case ErrorType.SYSTEM:
    default:
      return 500;
  }
}

export abstract class RelayError extends Error {
  abstract readonly type: ErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get statusCode(): number {
    return mapErrorTypeToStatus(this.type);
  }
}

/** Bad or missing input; rejected before any remote call */
export class ValidationError extends RelayError {
  readonly type = ErrorType.USER;
}

/** A push event names a task that this session does not track */
export class UnknownTaskError extends RelayError {
  readonly type = ErrorType.NOT_FOUND;

  constructor(readonly taskId: string) {
    super(`The task ${taskId} was not found.`);
  }
}

/** Result fetch for a task that was never created or was already consumed */
export class NotFoundError extends RelayError {
  readonly type = ErrorType.NOT_FOUND;

  constructor(readonly taskId: string) {
    super(`The task ${taskId} was not found.`);
  }
}

/** Transport or protocol failure while talking to the remote agent */
export class RemoteTaskError extends RelayError {
  readonly type = ErrorType.SYSTEM;
}

/** Remote failure while submitting a new task */
export class RemoteSubmissionError extends RemoteTaskError {}

/** The remote agent reported the task as failed in its synchronous response */
export class TaskFailedError extends RelayError {
  readonly type = ErrorType.SYSTEM;

  constructor(readonly taskId: string) {
    super('The task has failed.');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
