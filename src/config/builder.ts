/**
 * Fluent configuration builder for direct uploads
 * @module dataverse-direct-upload/config/builder
 */

import type {
  ChecksumAlgorithm,
  NormalizedUploaderConfig,
  RetryConfig,
  UploaderConfig,
} from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing uploader configuration.
 *
 * @example
 * ```typescript
 * const config = new UploaderConfigBuilder()
 *   .parallelUploads(4)
 *   .maxPackageSize(64 * 1024 * 1024)
 *   .retry({ maxRetries: 5 })
 *   .build();
 * ```
 */
export class UploaderConfigBuilder {
  private config: Partial<UploaderConfig> = {};

  /**
   * Sets the number of files uploading at the same time.
   */
  parallelUploads(n: number): this {
    this.config.nParallelUploads = n;
    return this;
  }

  /**
   * Sets the ceiling on simultaneous byte transfers across all files.
   */
  maxConcurrentTransfers(n: number): this {
    this.config.maxConcurrentTransfers = n;
    return this;
  }

  /**
   * Sets the single-package size threshold in bytes.
   */
  maxPackageSize(bytes: number): this {
    this.config.maxPackageSize = bytes;
    return this;
  }

  timeout(ms: number): this {
    this.config.timeoutMs = ms;
    return this;
  }

  checksumAlgorithm(algorithm: ChecksumAlgorithm): this {
    this.config.checksumAlgorithm = algorithm;
    return this;
  }

  abortOnFailure(enabled: boolean): this {
    this.config.abortOnFailure = enabled;
    return this;
  }

  skipDuplicates(enabled: boolean): this {
    this.config.skipDuplicates = enabled;
    return this;
  }

  /**
   * Merges retry overrides into any already set.
   */
  retry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  /**
   * Validates and freezes the configuration.
   *
   * @throws {ConfigError} If configuration is invalid or incomplete
   */
  build(): NormalizedUploaderConfig {
    return normalizeConfig({
      ...this.config,
      nParallelUploads: this.config.nParallelUploads ?? Number.NaN,
    });
  }
}
