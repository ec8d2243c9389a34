/**
 * Configuration type definitions for direct uploads
 * @module dataverse-direct-upload/config/types
 */

/**
 * Digest algorithms the controlling API accepts for registered files
 */
export type ChecksumAlgorithm = 'MD5' | 'SHA-1' | 'SHA-256' | 'SHA-512';

/**
 * Retry configuration.
 *
 * The delay before retry `n` (0-based) is
 * `clamp(minDelayMs * (1 + multiplier) ^ n, minDelayMs, maxDelayMs)`.
 */
export interface RetryConfig {
  /**
   * Maximum number of attempts for a single operation (first try included).
   * @default 15
   */
  maxRetries: number;

  /**
   * Lower bound of the backoff delay in milliseconds.
   * @default 1000
   */
  minDelayMs: number;

  /**
   * Upper bound of the backoff delay in milliseconds.
   * @default 240000
   */
  maxDelayMs: number;

  /**
   * Growth rate of the backoff delay per attempt.
   * @default 0.1
   */
  multiplier: number;

  /**
   * Jitter factor (0.0 to 1.0); jittered delays stay within the bounds.
   * @default 0
   */
  jitterFactor: number;
}

/**
 * Core uploader configuration parameters.
 */
export interface UploaderConfig {
  /**
   * Number of files uploading at the same time. No default: the caller decides.
   */
  nParallelUploads: number;

  /**
   * Ceiling on simultaneous byte transfers across all files.
   * Defaults to `nParallelUploads`.
   */
  maxConcurrentTransfers?: number;

  /**
   * Files larger than this many bytes must use the multipart path.
   * @default 2147483648 (2 GiB)
   */
  maxPackageSize?: number;

  /**
   * Request timeout in milliseconds.
   * @default 300000 (5 minutes)
   */
  timeoutMs?: number;

  /**
   * Digest sent along with each registered file.
   * @default 'MD5'
   */
  checksumAlgorithm?: ChecksumAlgorithm;

  /**
   * Whether to release storage for a failed multipart upload.
   * @default true
   */
  abortOnFailure?: boolean;

  /**
   * Compare files with the dataset's current files before uploading: skip
   * files whose checksum is already present and replace files found at the
   * same path.
   * @default true
   */
  skipDuplicates?: boolean;

  /**
   * Retry configuration overrides.
   */
  retry?: Partial<RetryConfig>;
}

/**
 * Normalized, immutable configuration with all fields populated.
 */
export interface NormalizedUploaderConfig {
  readonly nParallelUploads: number;
  readonly maxConcurrentTransfers: number;
  readonly maxPackageSize: number;
  readonly timeoutMs: number;
  readonly checksumAlgorithm: ChecksumAlgorithm;
  readonly abortOnFailure: boolean;
  readonly skipDuplicates: boolean;
  readonly retry: Readonly<RetryConfig>;
}
