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
 * Invalid input to a public operation
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.details = details;
  }
}

export type DownloadFailureReason = 'status' | 'network' | 'timeout' | 'aborted' | 'pool';

/**
 * One HTTP attempt made while fetching an image
 */
export interface FetchAttempt {
  url: string;
  source: 'primary' | 'fallback';
  statusCode?: number;
  error?: string;
  durationMs: number;
}

/**
 * Both primary and fallback sources failed, or the fetch deadline passed
 */
export class DownloadError extends AppError {
  public readonly reason: DownloadFailureReason;
  public readonly attempts: readonly FetchAttempt[];

  constructor(message: string, reason: DownloadFailureReason, attempts: readonly FetchAttempt[] = []) {
    super(message, 'DOWNLOAD_FAILED');
    this.reason = reason;
    this.attempts = attempts;
  }
}

/**
 * Image payload could not be decoded. Absorbed by processors and the region detector.
 */
export class DecodeError extends AppError {
  public readonly originalError?: Error;

  constructor(message = 'Image could not be decoded', originalError?: Error) {
    super(message, 'DECODE_FAILED');
    this.originalError = originalError;
  }
}

/**
 * Unexpected fault inside a processing path or while merging results
 */
export class ProcessingError extends AppError {
  public readonly processor?: string;
  public readonly originalError?: Error;

  constructor(message: string, processor?: string, originalError?: Error) {
    super(processor ? `${processor}: ${message}` : message, 'PROCESSING_FAILED');
    this.processor = processor;
    this.originalError = originalError;
  }
}

/**
 * Connection pool has no free slot and its pending queue is full
 */
export class PoolExhaustedError extends AppError {
  constructor(message = 'Connection pool exhausted') {
    super(message, 'POOL_EXHAUSTED');
  }
}

/**
 * Connection pool has been closed
 */
export class PoolClosedError extends AppError {
  constructor(message = 'Connection pool is closed') {
    super(message, 'POOL_CLOSED');
  }
}

/**
 * A reference-counted resource was read after its last release
 */
export class ResourceReleasedError extends AppError {
  constructor(message = 'Resource already released') {
    super(message, 'RESOURCE_RELEASED', false);
  }
}

/**
 * Lifecycle call made in a state that does not allow it
 */
export class PipelineStateError extends AppError {
  public readonly state: string;

  constructor(state: string, message: string) {
    super(message, 'INVALID_PIPELINE_STATE');
    this.state = state;
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
