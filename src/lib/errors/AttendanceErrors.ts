/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Rejected input; nothing was changed
   */
  INPUT = 'input',

  /**
   * Requested data does not exist (yet)
   */
  NOT_FOUND = 'not_found',

  /**
   * The feature extractor produced no vector
   */
  ENCODING = 'encoding',

  /**
   * Backing store I/O failure
   */
  STORAGE = 'storage',

  /**
   * Invalid configuration
   */
  CONFIG = 'config'
}

/**
 * Base error class for face-attendance errors
 */
export abstract class FaceAttendanceError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Input rejected before any state mutation
 */
export class InputError extends FaceAttendanceError {
  constructor(message: string, code: string = 'INPUT_ERROR') {
    super(message, code, ErrorCategory.INPUT, false);
  }
}

/**
 * Empty or reserved identity
 */
export class InvalidIdentityError extends InputError {
  public readonly identity: string;

  constructor(identity: string, reason: string) {
    super(`Invalid identity ${JSON.stringify(identity)}: ${reason}`, 'INVALID_IDENTITY');
    this.identity = identity;
  }
}

/**
 * Vector length differs from the registry dimension
 */
export class DimensionMismatchError extends InputError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, 'DIMENSION_MISMATCH');
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Requested entity does not exist
 */
export class NotFoundError extends FaceAttendanceError {
  public readonly resource: string;

  constructor(resource: string, message?: string, code: string = 'NOT_FOUND') {
    super(message ?? `${resource} not found`, code, ErrorCategory.NOT_FOUND, false);
    this.resource = resource;
  }
}

/**
 * The registry was never built, so there is nothing to match against
 */
export class EmbeddingsUnavailableError extends NotFoundError {
  constructor() {
    super(
      'embeddings',
      'Embedding registry has not been built. Enroll at least one identity or run "face-attendance rebuild".',
      'EMBEDDINGS_UNAVAILABLE'
    );
  }
}

/**
 * A bulk rebuild derived no identities
 */
export class EmptyResultError extends FaceAttendanceError {
  public readonly samplesSeen: number;

  constructor(samplesSeen: number) {
    super(
      `No embeddings could be derived from ${samplesSeen} sample(s); registry left unchanged`,
      'EMPTY_RESULT',
      ErrorCategory.INPUT,
      false
    );
    this.samplesSeen = samplesSeen;
  }
}

/**
 * The feature extractor could not produce a vector
 */
export class EncodingFailedError extends FaceAttendanceError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Unable to encode face: ${reason}`, 'ENCODING_FAILED', ErrorCategory.ENCODING, false);
    this.reason = reason;
  }
}

/**
 * Storage collaborator failure
 */
export class BackingStoreError extends FaceAttendanceError {
  public readonly operation: string;
  public readonly originalError?: Error;

  constructor(operation: string, originalError?: unknown) {
    const cause = originalError instanceof Error ? originalError : undefined;
    const detail = cause ? cause.message : originalError === undefined ? '' : String(originalError);
    super(
      `Backing store operation '${operation}' failed${detail ? `: ${detail}` : ''}`,
      'BACKING_STORE',
      ErrorCategory.STORAGE,
      true
    );
    this.operation = operation;
    this.originalError = cause;
  }
}

/**
 * Configuration validation error
 */
export class ConfigError extends FaceAttendanceError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'CONFIG_ERROR', ErrorCategory.CONFIG, false);
    this.field = field;
  }
}
