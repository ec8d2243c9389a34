/**
 * Configuration validation and normalization for direct uploads
 * @module dataverse-direct-upload/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { NormalizedUploaderConfig, UploaderConfig } from './types.js';
import {
  DEFAULT_CHECKSUM_ALGORITHM,
  DEFAULT_MAX_PACKAGE_SIZE,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TIMEOUT_MS,
} from './defaults.js';

/**
 * Zod schema for retry configuration validation.
 */
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(1, 'maxRetries must allow at least one attempt'),
    minDelayMs: z.number().finite().min(0),
    maxDelayMs: z.number().finite().min(0),
    multiplier: z.number().finite().min(0),
    jitterFactor: z.number().min(0).max(1),
  })
  .refine((config) => config.maxDelayMs >= config.minDelayMs, {
    message: 'maxDelayMs must be greater than or equal to minDelayMs',
    path: ['maxDelayMs'],
  });

/**
 * Zod schema for the normalized uploader configuration.
 */
const NormalizedConfigSchema = z.object({
  nParallelUploads: z.number().int().min(1),
  maxConcurrentTransfers: z.number().int().min(1),
  maxPackageSize: z.number().int().min(1),
  timeoutMs: z.number().int().min(1),
  checksumAlgorithm: z.enum(['MD5', 'SHA-1', 'SHA-256', 'SHA-512']),
  abortOnFailure: z.boolean(),
  skipDuplicates: z.boolean(),
  retry: RetryConfigSchema,
});

/**
 * Formats zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Normalizes uploader configuration by applying defaults and validating.
 *
 * The returned object is frozen: it is shared read-only by every worker.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: UploaderConfig): NormalizedUploaderConfig {
  const merged = {
    nParallelUploads: config.nParallelUploads,
    maxConcurrentTransfers: config.maxConcurrentTransfers ?? config.nParallelUploads,
    maxPackageSize: config.maxPackageSize ?? DEFAULT_MAX_PACKAGE_SIZE,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    checksumAlgorithm: config.checksumAlgorithm ?? DEFAULT_CHECKSUM_ALGORITHM,
    abortOnFailure: config.abortOnFailure ?? true,
    skipDuplicates: config.skipDuplicates ?? true,
    retry: {
      ...DEFAULT_RETRY_CONFIG,
      ...config.retry,
    },
  };

  const result = NormalizedConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError({
      message: `Invalid uploader configuration: ${formatIssues(result.error)}`,
      code: 'INVALID_CONFIG',
      details: { issues: result.error.issues },
    });
  }

  const normalized: NormalizedUploaderConfig = {
    ...result.data,
    retry: Object.freeze({ ...result.data.retry }),
  };

  return Object.freeze(normalized);
}

/**
 * Returns a copy of a normalized configuration with overrides applied.
 *
 * Used for per-invocation overrides; the original snapshot is never mutated.
 */
export function withOverrides(
  base: NormalizedUploaderConfig,
  overrides: Partial<UploaderConfig>
): NormalizedUploaderConfig {
  const nParallelUploads = overrides.nParallelUploads ?? base.nParallelUploads;
  return normalizeConfig({
    ...base,
    ...overrides,
    nParallelUploads,
    maxConcurrentTransfers:
      overrides.maxConcurrentTransfers ??
      (overrides.nParallelUploads !== undefined ? undefined : base.maxConcurrentTransfers),
    retry: { ...base.retry, ...overrides.retry },
  });
}
