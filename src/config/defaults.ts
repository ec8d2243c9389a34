/**
 * Default configuration values for direct uploads
 * @module dataverse-direct-upload/config/defaults
 */

import type { ChecksumAlgorithm, RetryConfig } from './types.js';

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT_MS = 300000;

/**
 * Default single-package size threshold in bytes (2 GiB).
 */
export const DEFAULT_MAX_PACKAGE_SIZE = 2 * 1024 ** 3;

/**
 * Default digest algorithm.
 */
export const DEFAULT_CHECKSUM_ALGORITHM: ChecksumAlgorithm = 'MD5';

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 15,
  minDelayMs: 1000,
  maxDelayMs: 240000,
  multiplier: 0.1,
  jitterFactor: 0,
};
