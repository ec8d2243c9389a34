/**
 * Specific error categories for direct uploads
 * @module dataverse-direct-upload/errors/categories
 */

import { DirectUploadError, type DirectUploadErrorParams } from './error.js';

/**
 * Constructor parameters shared by all categories; retryability defaults per category
 */
export type CategoryErrorParams = Omit<DirectUploadErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Malformed unit input: missing file, negative size, unreadable path
 */
export class ValidationError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'validation', isRetryable: false });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fileNotFound(filepath: string): ValidationError {
    return new ValidationError({
      message: `File ${filepath} does not exist`,
      code: 'FILE_NOT_FOUND',
      details: { filepath },
    });
  }

  static notAFile(filepath: string): ValidationError {
    return new ValidationError({
      message: `Filepath ${filepath} is not a file`,
      code: 'NOT_A_FILE',
      details: { filepath },
    });
  }

  static unreadable(filepath: string, reason: string): ValidationError {
    return new ValidationError({
      message: `File ${filepath} cannot be read: ${reason}`,
      code: 'FILE_UNREADABLE',
      details: { filepath },
    });
  }

  static invalidParameter(paramName: string, message?: string): ValidationError {
    return new ValidationError({
      message: message ?? `Invalid parameter: ${paramName}`,
      code: 'INVALID_PARAMETER',
      details: { paramName },
    });
  }
}

/**
 * Credential rejected by the controlling API
 */
export class AuthError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'auth', isRetryable: false });
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }

  static rejected(status: number, message?: string): AuthError {
    return new AuthError({
      message: message ?? 'API token was rejected by the controlling API',
      code: status === 401 ? 'UNAUTHORIZED' : 'FORBIDDEN',
      status,
    });
  }
}

/**
 * Connection failures, timeouts, throttling and 5xx responses
 */
export class NetworkError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'network', isRetryable: params.isRetryable ?? true });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
    });
  }

  static connectionReset(cause?: unknown): NetworkError {
    return new NetworkError({
      message: 'Connection was reset by peer',
      code: 'CONNECTION_RESET',
      cause,
    });
  }

  static serverError(status: number, message?: string, retryAfter?: number): NetworkError {
    return new NetworkError({
      message: message ?? `Server responded with status ${status}`,
      code: status === 429 ? 'TOO_MANY_REQUESTS' : 'SERVER_ERROR',
      status,
      retryAfter,
    });
  }
}

/**
 * Controlling-API-side concurrency conflict, typically a dataset lock held
 * while earlier tabular files are still being ingested
 */
export class LockConflictError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'lock_conflict', isRetryable: params.isRetryable ?? true });
    this.name = 'LockConflictError';
    Object.setPrototypeOf(this, LockConflictError.prototype);
  }

  static datasetLocked(status: number, message?: string): LockConflictError {
    return new LockConflictError({
      message: message ?? 'Dataset cannot be edited due to a dataset lock',
      code: 'DATASET_LOCKED',
      status,
    });
  }
}

/**
 * Chunk-size negotiation or byte-range invariant violation
 */
export class PackagingError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'packaging', isRetryable: false });
    this.name = 'PackagingError';
    Object.setPrototypeOf(this, PackagingError.prototype);
  }

  static malformedTicket(message: string, details?: Record<string, unknown>): PackagingError {
    return new PackagingError({
      message: `Malformed upload ticket: ${message}`,
      code: 'MALFORMED_TICKET',
      details,
    });
  }

  static partCountMismatch(expected: number, actual: number): PackagingError {
    return new PackagingError({
      message: `Controlling API issued ${actual} part URL(s) but the file splits into ${expected} chunk(s)`,
      code: 'PART_COUNT_MISMATCH',
      details: { expected, actual },
    });
  }

  static invalidPartOrder(message: string): PackagingError {
    return new PackagingError({
      message,
      code: 'INVALID_PART_ORDER',
    });
  }

  static singleUrlTooLarge(size: number, maxPackageSize: number): PackagingError {
    return new PackagingError({
      message: `Controlling API issued a single upload URL for ${size} bytes, above the ${maxPackageSize} byte package limit`,
      code: 'SINGLE_URL_TOO_LARGE',
      details: { size, maxPackageSize },
    });
  }

  static missingETag(partNumber: number): PackagingError {
    return new PackagingError({
      message: `Storage returned no ETag for part ${partNumber}`,
      code: 'MISSING_ETAG',
      details: { partNumber },
    });
  }

  static invalidTransition(from: string, to: string): PackagingError {
    return new PackagingError({
      message: `Invalid upload state transition: ${from} -> ${to}`,
      code: 'INVALID_TRANSITION',
      details: { from, to },
    });
  }
}

/**
 * Invalid uploader configuration
 */
export class ConfigError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'config', isRetryable: false });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Operation stopped by an abort-all request
 */
export class CancelledError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'cancelled', isRetryable: false });
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, CancelledError.prototype);
  }

  static aborted(reason?: string): CancelledError {
    return new CancelledError({
      message: reason ? `Upload aborted: ${reason}` : 'Upload aborted',
      code: 'ABORTED',
    });
  }
}

/**
 * Any other non-retryable rejection by the controlling API or storage
 */
export class ApiError extends DirectUploadError {
  constructor(params: CategoryErrorParams) {
    super({ ...params, type: 'api', isRetryable: false });
    this.name = 'ApiError';
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  static unexpectedStatus(status: number, message?: string): ApiError {
    return new ApiError({
      message: message ?? `Unexpected response status ${status}`,
      code: status === 404 ? 'NOT_FOUND' : 'BAD_REQUEST',
      status,
    });
  }
}
