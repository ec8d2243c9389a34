/**
 * Error mapping utilities for direct uploads
 * @module dataverse-direct-upload/errors/mapping
 */

import { DirectUploadError, type ErrorClassification } from './error.js';
import {
  ApiError,
  AuthError,
  CancelledError,
  LockConflictError,
  NetworkError,
  ValidationError,
} from './categories.js';

/**
 * Matches the controlling API's lock messages ("Dataset cannot be edited due to dataset lock.")
 */
const LOCK_MESSAGE_PATTERN = /\block(ed)?\b/i;

/**
 * Socket-level codes raised by undici and Node's net stack that are worth retrying
 */
const RETRYABLE_SYSTEM_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Summary of an error as reported on a failed upload result
 */
export interface ErrorSummary {
  classification: ErrorClassification;
  message: string;
  code?: string;
  status?: number;
}

/**
 * Maps an HTTP error response to the error taxonomy
 *
 * @param status - HTTP status code (>= 400)
 * @param message - Message extracted from the response body, if any
 * @param retryAfter - Retry-After header value in seconds, if any
 */
export function mapHttpStatusToError(
  status: number,
  message?: string,
  retryAfter?: number
): DirectUploadError {
  // Lock conflicts come back as 403 or 409 depending on the endpoint
  if (status === 409 || (message !== undefined && LOCK_MESSAGE_PATTERN.test(message))) {
    return LockConflictError.datasetLocked(status, message);
  }

  switch (status) {
    case 401:
    case 403:
      return AuthError.rejected(status, message);

    case 408:
      return new NetworkError({
        message: message ?? 'Request timeout',
        code: 'REQUEST_TIMEOUT',
        status,
      });

    case 429:
      return NetworkError.serverError(status, message, retryAfter);

    default:
      if (status >= 500) {
        return NetworkError.serverError(status, message, retryAfter);
      }
      return ApiError.unexpectedStatus(status, message);
  }
}

/**
 * Checks if an error is a DirectUploadError
 */
export function isDirectUploadError(error: unknown): error is DirectUploadError {
  return error instanceof DirectUploadError;
}

/**
 * Checks whether the retry policy may retry after this error
 */
export function isRetryableError(error: unknown): boolean {
  return isDirectUploadError(error) && error.isRetryable;
}

function systemCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Wraps a foreign error into the error taxonomy
 *
 * DirectUploadErrors pass through unchanged.
 */
export function wrapError(error: unknown, context?: string): DirectUploadError {
  if (isDirectUploadError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const prefixed = context ? `${context}: ${message}` : message;
  const code = systemCode(error);

  if (code !== undefined) {
    if (code === 'UND_ERR_ABORTED' || code === 'ABORT_ERR') {
      return new CancelledError({ message: prefixed, code, cause: error });
    }
    if (code === 'ENOENT' || code === 'EISDIR' || code === 'EACCES') {
      return new ValidationError({ message: prefixed, code, cause: error });
    }
    if (RETRYABLE_SYSTEM_CODES.has(code)) {
      return new NetworkError({ message: prefixed, code, cause: error });
    }
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new CancelledError({ message: prefixed, code: 'ABORTED', cause: error });
  }

  return new ApiError({ message: prefixed, code: code ?? 'UNKNOWN', cause: error });
}

/**
 * Summarizes an error for an upload result
 */
export function summarizeError(error: unknown): ErrorSummary {
  const wrapped = wrapError(error);
  return {
    classification: wrapped.type,
    message: wrapped.message,
    ...(wrapped.code !== undefined && { code: wrapped.code }),
    ...(wrapped.status !== undefined && { status: wrapped.status }),
  };
}
