/**
 * Configuration for direct uploads
 * @module dataverse-direct-upload/config
 */

export type {
  ChecksumAlgorithm,
  RetryConfig,
  UploaderConfig,
  NormalizedUploaderConfig,
} from './types.js';

export {
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_PACKAGE_SIZE,
  DEFAULT_CHECKSUM_ALGORITHM,
  DEFAULT_RETRY_CONFIG,
} from './defaults.js';

export { normalizeConfig, withOverrides, formatIssues } from './validation.js';

export { UploaderConfigBuilder } from './builder.js';
