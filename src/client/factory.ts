/**
 * Factory functions for creating direct upload clients
 * @module dataverse-direct-upload/client
 */

import type { Dispatcher } from 'undici';
import { normalizeConfig, type UploaderConfig } from '../config/index.js';
import { createLogger, type Logger, type ProgressObserver } from '../observability/index.js';
import type { SleepFunction } from '../resilience/index.js';
import { createUndiciTransport, type HttpTransport } from '../transport/index.js';
import { DirectUploadClient } from './client.js';

export interface CreateClientOptions {
  /** Defaults to a ConsoleLogger at `info` */
  logger?: Logger;
  observer?: ProgressObserver;
  /** Replaces the default undici transport */
  transport?: HttpTransport;
  /** Dispatcher for the default transport (proxy agent, mock agent) */
  dispatcher?: Dispatcher;
  sleep?: SleepFunction;
}

/**
 * Creates a client from a configuration object
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({ nParallelUploads: 4 });
 *
 * try {
 *   const batch = await client.upload({
 *     dataverseUrl: 'https://demo.dataverse.org',
 *     persistentId: 'doi:10.70122/FK2/EXAMPLE',
 *     apiToken: token,
 *     files: [{ filepath: './data/measurements.csv', directoryLabel: 'raw' }],
 *   });
 *   console.log(`${batch.succeeded} uploaded, ${batch.failed} failed`);
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: UploaderConfig, options: CreateClientOptions = {}): DirectUploadClient {
  const normalizedConfig = normalizeConfig(config);
  const logger = options.logger ?? createLogger();

  const transport =
    options.transport ??
    createUndiciTransport({
      timeoutMs: normalizedConfig.timeoutMs,
      logger,
      ...(options.dispatcher && { dispatcher: options.dispatcher }),
    });

  return new DirectUploadClient(normalizedConfig, transport, logger, options.observer, options.sleep);
}
