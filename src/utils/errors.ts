/**
 * Base application error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Caller-supplied batch violates a precondition (empty input list,
 * missing or unwritable output directory, run already started).
 * The only error that aborts a run, and only before any worker starts.
 */
export class BatchValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Invalid batch', details?: unknown) {
    super(message, 'BATCH_VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * Kinds of per-file failure a worker can report
 */
export type ProcessingErrorKind = 'DecodeError' | 'TransformError' | 'EncodeError';

/**
 * Failure while processing a single image
 */
export class ImageProcessingError extends AppError {
  public readonly errorKind: ProcessingErrorKind;
  public readonly path?: string;
  public readonly originalError?: Error;

  constructor(
    errorKind: ProcessingErrorKind,
    code: string,
    message: string,
    path?: string,
    originalError?: Error
  ) {
    super(message, code);
    this.errorKind = errorKind;
    this.path = path;
    this.originalError = originalError;
  }
}

/**
 * Input missing, unreadable, corrupt or in an unsupported container
 */
export class DecodeError extends ImageProcessingError {
  constructor(message: string, path?: string, originalError?: Error) {
    super('DecodeError', 'DECODE_ERROR', message, path, originalError);
  }
}

/**
 * Pixel buffer shape is malformed
 */
export class TransformError extends ImageProcessingError {
  constructor(message: string, path?: string, originalError?: Error) {
    super('TransformError', 'TRANSFORM_ERROR', message, path, originalError);
  }
}

/**
 * Output could not be encoded or written
 */
export class EncodeError extends ImageProcessingError {
  constructor(message: string, path?: string, originalError?: Error) {
    super('EncodeError', 'ENCODE_ERROR', message, path, originalError);
  }
}

/**
 * Extract a readable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize anything that was thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
