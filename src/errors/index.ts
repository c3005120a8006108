/**
 * Error hierarchy for mock storage and delivery.
 *
 * Every error is returned to the immediate caller; nothing here is retried
 * internally, so `retryable` is informational only.
 */

export type MockErrorCode =
  | 'Validation'
  | 'NotFound'
  | 'InvalidId'
  | 'CorruptData'
  | 'List'
  | 'Write'
  | 'Config';

/**
 * Base class for all mockvault errors
 */
export class MockError extends Error {
  public readonly code: MockErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: MockErrorCode, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = 'MockError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, MockError.prototype);
  }
}

export type ValidatedField = 'status' | 'contentType' | 'charset';

/**
 * A candidate's status, content type or charset is outside its vocabulary
 */
export class ValidationError extends MockError {
  public readonly field: ValidatedField;
  public readonly value: string | number;

  constructor(field: ValidatedField, value: string | number) {
    super(`${field} {${value}} does not exist`, 'Validation');
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends MockError {
  public readonly id: string;

  constructor(id: string, options?: { cause?: unknown }) {
    super(`mock {${id}} does not exist`, 'NotFound', options);
    this.name = 'NotFoundError';
    this.id = id;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * The identifier does not have the shape of a generated id
 */
export class InvalidIdError extends MockError {
  public readonly id: string;

  constructor(id: string, reason: string) {
    super(`invalid id ${reason}`, 'InvalidId');
    this.name = 'InvalidIdError';
    this.id = id;
    Object.setPrototypeOf(this, InvalidIdError.prototype);
  }
}

export class CorruptDataError extends MockError {
  public readonly id: string;

  constructor(id: string, options?: { cause?: unknown }) {
    super(`mock {${id}} cannot be read: stored data is corrupt`, 'CorruptData', options);
    this.name = 'CorruptDataError';
    this.id = id;
    Object.setPrototypeOf(this, CorruptDataError.prototype);
  }
}

export class ListError extends MockError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'List', options);
    this.name = 'ListError';
    Object.setPrototypeOf(this, ListError.prototype);
  }
}

export class WriteError extends MockError {
  public readonly id: string;

  constructor(id: string, options?: { cause?: unknown }) {
    super(`mock {${id}} could not be written`, 'Write', options);
    this.name = 'WriteError';
    this.id = id;
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

export class ConfigError extends MockError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'Config', options);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * HTTP status the routing layer answers with for a failed operation
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof MockError) return 409;
  return 500;
}

/**
 * Message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
