export type ErrorKind = 'validation' | 'not_found' | 'conflict' | 'forbidden' | 'timeout';

export type ValidationCode =
  | 'INVALID_DISPLAY_NAME'
  | 'INVALID_HOST_DISPLAY_NAME'
  | 'INVALID_TITLE'
  | 'INVALID_QUESTION_BODY'
  | 'INVALID_LIMIT';

export type NotFoundCode = 'SESSION_NOT_FOUND';

export type ConflictCode =
  | 'HOST_SESSION_LIMIT_EXCEEDED'
  | 'SESSION_NOT_JOINABLE'
  | 'QUESTION_LIMIT_EXCEEDED'
  | 'CODE_COLLISION_EXHAUSTED';

export type ForbiddenCode = 'NOT_PARTICIPANT';

export type TimeoutCode = 'STORE_TIMEOUT';

export type ErrorCode = ValidationCode | NotFoundCode | ConflictCode | ForbiddenCode | TimeoutCode;

export abstract class SessionServiceError<Code extends ErrorCode = ErrorCode> extends Error {
  abstract readonly kind: ErrorKind;
  /** Whether the caller may retry the same request with backoff. */
  readonly retryable: boolean;

  protected constructor(readonly code: Code, message: string, retryable = false) {
    super(message);
    this.retryable = retryable;
  }
}

export class ValidationError extends SessionServiceError<ValidationCode> {
  readonly kind = 'validation';

  constructor(code: ValidationCode, message: string) {
    super(code, message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends SessionServiceError<NotFoundCode> {
  readonly kind = 'not_found';

  constructor(code: NotFoundCode, message: string) {
    super(code, message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends SessionServiceError<ConflictCode> {
  readonly kind = 'conflict';

  constructor(code: ConflictCode, message: string) {
    super(code, message, code === 'CODE_COLLISION_EXHAUSTED');
    this.name = 'ConflictError';
  }
}

export class ForbiddenError extends SessionServiceError<ForbiddenCode> {
  readonly kind = 'forbidden';

  constructor(code: ForbiddenCode, message: string) {
    super(code, message);
    this.name = 'ForbiddenError';
  }
}

export class StoreTimeoutError extends SessionServiceError<TimeoutCode> {
  readonly kind = 'timeout';

  constructor(message = 'データベースの応答がタイムアウトしました。', options?: { cause?: unknown }) {
    super('STORE_TIMEOUT', message, true);
    this.name = 'StoreTimeoutError';
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}

export function isSessionServiceError(error: unknown): error is SessionServiceError {
  return error instanceof SessionServiceError;
}
