/**
 * Base error class for direct uploads
 * @module dataverse-direct-upload/errors/error
 */

/**
 * Error classification reported on every failed upload result
 */
export type ErrorClassification =
  | 'validation'
  | 'auth'
  | 'network'
  | 'lock_conflict'
  | 'packaging'
  | 'config'
  | 'cancelled'
  | 'api';

/**
 * Parameters for creating a DirectUploadError
 */
export interface DirectUploadErrorParams {
  /**
   * Error classification
   */
  readonly type: ErrorClassification;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether this error is retryable
   */
  readonly isRetryable: boolean;

  /**
   * Retry-After header value in seconds
   */
  readonly retryAfter?: number;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all direct upload operations
 *
 * Every error that leaves the transport, the service or a runner is an
 * instance of this class, so results can carry a classification, the
 * last message and whether a retry would have been attempted.
 */
export class DirectUploadError extends Error {
  readonly type: ErrorClassification;
  readonly status?: number;
  readonly code?: string;
  readonly isRetryable: boolean;
  readonly retryAfter?: number;
  readonly details?: Record<string, unknown>;

  constructor(params: DirectUploadErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, DirectUploadError.prototype);

    this.name = 'DirectUploadError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.retryAfter = params.retryAfter;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DirectUploadError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      retryAfter: this.retryAfter,
      details: this.details,
    };
  }

  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
