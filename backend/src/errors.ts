export type ErrorDetail = {
  path: string;
  message: string;
};

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_FAILED';

  constructor(readonly details: ErrorDetail[]) {
    super(details.length ? `${details[0].path || 'body'}: ${details[0].message}` : 'Invalid input');
    this.name = 'ValidationError';
  }
}

export class DuplicateEmailError extends AppError {
  readonly statusCode = 400;
  readonly code = 'EMAIL_ALREADY_REGISTERED';

  constructor() {
    super('Email already registered');
    this.name = 'DuplicateEmailError';
  }
}

// Same message for unknown email and wrong password.
export class InvalidCredentialsError extends AppError {
  readonly statusCode = 401;
  readonly code = 'INVALID_CREDENTIALS';

  constructor() {
    super('Invalid credentials');
    this.name = 'InvalidCredentialsError';
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;

  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Store-level failures, raised by the document store adapter. */
export abstract class StoreError extends AppError {}

export class StoreUnavailableError extends StoreError {
  readonly statusCode = 503;
  readonly code = 'DATABASE_UNAVAILABLE';

  constructor() {
    super('Database not available');
    this.name = 'StoreUnavailableError';
  }
}

export class DuplicateKeyError extends StoreError {
  readonly statusCode = 409;
  readonly code = 'DUPLICATE_KEY';

  constructor(
    readonly collection: string,
    cause?: unknown
  ) {
    super(`Duplicate key in ${collection}`, { cause });
    this.name = 'DuplicateKeyError';
  }
}

export class WriteFailureError extends StoreError {
  readonly statusCode = 500;
  readonly code = 'WRITE_FAILED';

  constructor(
    readonly collection: string,
    cause?: unknown
  ) {
    super(`Write to ${collection} failed: ${describeCause(cause)}`, { cause });
    this.name = 'WriteFailureError';
  }
}

export class ReadFailureError extends StoreError {
  readonly statusCode = 500;
  readonly code = 'READ_FAILED';

  constructor(
    readonly collection: string,
    cause?: unknown
  ) {
    super(`Read from ${collection} failed: ${describeCause(cause)}`, { cause });
    this.name = 'ReadFailureError';
  }
}

export class PersistenceError extends AppError {
  readonly statusCode = 500;
  readonly code = 'PERSISTENCE_FAILED';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'unknown error';
}

export function truncateMessage(message: string, max = 100): string {
  return message.length > max ? `${message.slice(0, max)}...` : message;
}
