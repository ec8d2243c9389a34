/**
 * Batch entry point for direct uploads
 * @module dataverse-direct-upload/upload/orchestrator
 */

import { stat } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError, summarizeError } from '../errors/index.js';
import { formatIssues, withOverrides, type NormalizedUploaderConfig } from '../config/index.js';
import type { DatasetTarget, DirectUploadService } from '../direct-upload/index.js';
import {
  NOOP_PROGRESS_OBSERVER,
  NoopLogger,
  guardObserver,
  type Logger,
  type ProgressObserver,
} from '../observability/index.js';
import { createRetryExecutor, type RetryExecutor, type SleepFunction } from '../resilience/index.js';
import { DatasetFileIndex } from './duplicates.js';
import { WorkerPool, type PoolStats } from './pool.js';
import { UnitRunner, type UploadResult } from './runner.js';
import { UploadUnit, type FileDescriptor } from './unit.js';

/**
 * One batch of files bound for a dataset
 */
export interface DirectUploadRequest {
  persistentId: string;
  dataverseUrl: string;
  apiToken: string;
  files: FileDescriptor[];
  /** Overrides the configured number of parallel units for this batch */
  nParallelUploads?: number;
  signal?: AbortSignal;
  /** Receives this batch's progress events, in addition to the orchestrator's observer */
  observer?: ProgressObserver;
}

/**
 * Outcome of a batch; `results` follows the order of `request.files`
 */
export interface BatchUploadResult {
  results: UploadResult[];
  /** Files uploaded and registered */
  succeeded: number;
  /** Files left alone because the dataset already holds their bytes */
  skipped: number;
  failed: number;
  /** True when no file failed */
  success: boolean;
  stats: PoolStats;
}

export interface OrchestratorOptions {
  config: NormalizedUploaderConfig;
  /** Builds the protocol service for a batch's dataset */
  serviceFactory: (target: DatasetTarget) => DirectUploadService;
  logger?: Logger;
  observer?: ProgressObserver;
  /** Replaces the backoff wait; tests pass a no-op */
  sleep?: SleepFunction;
}

const RequestSchema = z.object({
  persistentId: z.string().min(1, 'persistentId is required'),
  dataverseUrl: z.string().url('dataverseUrl must be an absolute URL'),
  apiToken: z.string().min(1, 'apiToken is required'),
  files: z.array(z.unknown()),
  nParallelUploads: z.number().int().min(1).optional(),
});

/**
 * Uploads batches of files with bounded parallelism.
 *
 * A failed file never fails the batch: every file yields an UploadResult.
 * Smaller files are dispatched first.
 */
export class DirectUploadOrchestrator {
  private readonly config: NormalizedUploaderConfig;
  private readonly logger: Logger;
  private readonly observer: ProgressObserver;
  private readonly active = new Set<AbortController>();

  constructor(private readonly options: OrchestratorOptions) {
    this.config = options.config;
    this.logger = options.logger ?? new NoopLogger();
    this.observer = guardObserver(options.observer ?? NOOP_PROGRESS_OBSERVER, this.logger);
  }

  /**
   * Uploads every file of the request.
   *
   * @throws {ValidationError} If the request itself (not a file descriptor) is malformed
   */
  async upload(request: DirectUploadRequest): Promise<BatchUploadResult> {
    const parsed = RequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError({
        message: `Invalid upload request: ${formatIssues(parsed.error)}`,
        code: 'INVALID_REQUEST',
        details: { issues: parsed.error.issues },
      });
    }

    const config =
      request.nParallelUploads !== undefined
        ? withOverrides(this.config, { nParallelUploads: request.nParallelUploads })
        : this.config;

    const controller = new AbortController();
    const onExternalAbort = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }
    this.active.add(controller);

    const observer = combineObservers(
      this.observer,
      request.observer && guardObserver(request.observer, this.logger)
    );
    const service = this.options.serviceFactory({
      dataverseUrl: request.dataverseUrl,
      persistentId: request.persistentId,
      apiToken: request.apiToken,
    });
    const retry = createRetryExecutor(config.retry, {
      logger: this.logger,
      ...(this.options.sleep && { sleep: this.options.sleep }),
    });
    const pool = new WorkerPool(config.nParallelUploads, config.maxConcurrentTransfers);

    this.logger.info('Starting direct upload batch', {
      persistentId: request.persistentId,
      files: request.files.length,
      nParallelUploads: config.nParallelUploads,
    });

    try {
      const entries = parsed.data.files.map(toEntry);

      const listing =
        config.skipDuplicates && entries.length > 0
          ? await this.listDatasetFiles(service, retry, controller.signal)
          : undefined;

      const runner = new UnitRunner({
        service,
        config,
        retry,
        pool,
        logger: this.logger,
        observer,
        duplicates: listing?.index,
      });

      const results = new Array<UploadResult>(entries.length);
      const order = await dispatchOrder(entries);
      await Promise.all(
        order.map(async (i) => {
          results[i] = await this.runEntry(entries[i], runner, pool, observer, controller.signal, listing?.error);
        })
      );

      const count = (status: UploadResult['status']): number =>
        results.filter((result) => result.status === status).length;
      const batch: BatchUploadResult = {
        results,
        succeeded: count('completed'),
        skipped: count('skipped'),
        failed: count('failed'),
        success: count('failed') === 0,
        stats: pool.stats(),
      };

      this.logger.info('Direct upload batch finished', {
        persistentId: request.persistentId,
        succeeded: batch.succeeded,
        skipped: batch.skipped,
        failed: batch.failed,
      });
      return batch;
    } finally {
      this.active.delete(controller);
      request.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  /**
   * Cancels every batch in flight. Files not yet started fail as `cancelled`;
   * running operations observe the signal.
   */
  abortAll(): void {
    for (const controller of this.active) {
      controller.abort();
    }
  }

  /**
   * Fetches the dataset's files once per batch. A listing that fails after
   * its retries fails every file of the batch.
   */
  private async listDatasetFiles(
    service: DirectUploadService,
    retry: RetryExecutor,
    signal: AbortSignal
  ): Promise<{ index?: DatasetFileIndex; error?: unknown }> {
    try {
      const files = await retry.execute(() => service.listDatasetFiles(signal), {
        signal,
        operationName: 'list dataset files',
      });
      this.logger.debug('Listed dataset files', { count: files.length });
      return { index: new DatasetFileIndex(files) };
    } catch (error) {
      return { error };
    }
  }

  private async runEntry(
    entry: BatchEntry,
    runner: UnitRunner,
    pool: WorkerPool,
    observer: ProgressObserver,
    signal: AbortSignal,
    listingError: unknown
  ): Promise<UploadResult> {
    if (entry.kind === 'rejected') {
      return this.rejected(entry.filepath, entry.error, observer);
    }
    const { unit } = entry;

    if (listingError !== undefined) {
      unit.transition('failed');
      return this.rejected(unit.filepath, listingError, observer, unit.fileName);
    }

    try {
      return await pool.runUnit(() => runner.run(unit, signal), signal);
    } catch (error) {
      // only reachable when cancelled while waiting for a unit slot
      unit.transition('failed');
      return this.rejected(unit.filepath, error, observer, unit.fileName);
    }
  }

  private rejected(
    filepath: string,
    error: unknown,
    observer: ProgressObserver,
    fileName = ''
  ): UploadResult {
    const summary = summarizeError(error);
    this.logger.error('Upload rejected', { filepath, classification: summary.classification, message: summary.message });
    observer.onEvent({ type: 'unit_failed', filepath, error: summary });

    return {
      filepath,
      fileName,
      status: 'failed',
      success: false,
      error: summary,
      retries: 0,
      chunkRetries: [],
      bytesUploaded: 0,
    };
  }
}

/**
 * A request file, parsed or rejected
 */
type BatchEntry = { kind: 'unit'; unit: UploadUnit } | { kind: 'rejected'; filepath: string; error: unknown };

function toEntry(descriptor: unknown): BatchEntry {
  try {
    return { kind: 'unit', unit: UploadUnit.fromDescriptor(descriptor) };
  } catch (error) {
    return { kind: 'rejected', filepath: describeFilepath(descriptor), error };
  }
}

/**
 * Entry indices by ascending file size; ties keep request order.
 */
async function dispatchOrder(entries: readonly BatchEntry[]): Promise<number[]> {
  const sizes = await Promise.all(
    entries.map((entry) =>
      // unreadable files sort first; the runner reports why
      entry.kind === 'unit' ? stat(entry.unit.filepath).then((stats) => stats.size, () => 0) : 0
    )
  );
  return entries.map((_, i) => i).sort((a, b) => sizes[a] - sizes[b]);
}

function describeFilepath(descriptor: unknown): string {
  if (typeof descriptor === 'object' && descriptor !== null && 'filepath' in descriptor) {
    return typeof descriptor.filepath === 'string' ? descriptor.filepath : '';
  }
  return '';
}

function combineObservers(
  primary: ProgressObserver,
  secondary: ProgressObserver | undefined
): ProgressObserver {
  if (!secondary) return primary;
  return {
    onEvent(event): void {
      primary.onEvent(event);
      secondary.onEvent(event);
    },
  };
}
