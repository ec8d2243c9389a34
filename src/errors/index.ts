/**
 * Error system for direct uploads
 * @module dataverse-direct-upload/errors
 */

export {
  DirectUploadError,
  type DirectUploadErrorParams,
  type ErrorClassification,
} from './error.js';

export {
  ApiError,
  AuthError,
  CancelledError,
  ConfigError,
  LockConflictError,
  NetworkError,
  PackagingError,
  ValidationError,
  type CategoryErrorParams,
} from './categories.js';

export {
  mapHttpStatusToError,
  isDirectUploadError,
  isRetryableError,
  wrapError,
  summarizeError,
  type ErrorSummary,
} from './mapping.js';
