/**
 * Drives one file from planning to registration
 * @module dataverse-direct-upload/upload/runner
 */

import { stat } from 'node:fs/promises';
import {
  CancelledError,
  PackagingError,
  ValidationError,
  summarizeError,
  wrapError,
  type ErrorSummary,
} from '../errors/index.js';
import { computeChecksum, withChunkStream, type Chunk, type FileChecksum } from '../chunking/index.js';
import type { NormalizedUploaderConfig } from '../config/index.js';
import type { CompletedPart, DirectUploadService, RegisteredFile } from '../direct-upload/index.js';
import { guardObserver, type Logger, type ProgressEvent, type ProgressObserver } from '../observability/index.js';
import { RetryState, type RetryExecutor } from '../resilience/index.js';
import type { DatasetFileIndex, DuplicateDecision } from './duplicates.js';
import type { WorkerPool } from './pool.js';
import { selectStrategy, transferChunks, type UploadStrategy } from './strategy.js';
import type { UnitStatus, UploadUnit } from './unit.js';

/**
 * Outcome of one unit
 */
export interface UploadResult {
  filepath: string;
  fileName: string;
  status: Extract<UnitStatus, 'completed' | 'skipped' | 'failed'>;
  /** True for completed and skipped units */
  success: boolean;
  storageIdentifier?: string;
  /** Dataset file id reported on registration, or the existing file a skipped unit matched */
  fileId?: number;
  error?: ErrorSummary;
  /** Retries consumed across every operation of the unit */
  retries: number;
  /** Retries consumed per chunk index */
  chunkRetries: number[];
  bytesUploaded: number;
}

/**
 * Collaborators shared by every runner of a batch
 */
export interface UnitRunnerDependencies {
  service: DirectUploadService;
  config: NormalizedUploaderConfig;
  retry: RetryExecutor;
  pool: WorkerPool;
  logger: Logger;
  observer: ProgressObserver;
  /** Files already in the dataset; omitted when duplicates are not checked */
  duplicates?: DatasetFileIndex;
}

/**
 * Shared stop flag for the parts of one multipart upload
 */
interface PartHalt {
  readonly halted: boolean;
  fail(error: unknown): void;
}

interface UnitTracker {
  retries: number;
  chunkRetries: number[];
  bytesUploaded: number;
}

/**
 * Runs upload units. `run` never throws: every failure ends up in the result.
 */
export class UnitRunner {
  private readonly observer: ProgressObserver;

  constructor(private readonly deps: UnitRunnerDependencies) {
    this.observer = guardObserver(deps.observer, deps.logger);
  }

  async run(unit: UploadUnit, signal?: AbortSignal): Promise<UploadResult> {
    const tracker: UnitTracker = { retries: 0, chunkRetries: [], bytesUploaded: 0 };

    this.emit({ type: 'unit_started', filepath: unit.filepath, fileName: unit.fileName });

    let registered: RegisteredFile;
    try {
      throwIfAborted(signal);

      const { size, checksum } = await this.inspect(unit, signal);

      const decision: DuplicateDecision = this.deps.duplicates?.decide(unit, checksum) ?? { action: 'upload' };
      if (decision.action === 'skip') {
        return this.skip(unit, decision.fileId);
      }
      if (decision.action === 'replace' && unit.fileToReplaceId === undefined) {
        unit.fileToReplaceId = decision.fileId;
        this.deps.logger.info('Replacing existing dataset file', { fileName: unit.fileName, fileId: decision.fileId });
      }

      const strategy = await this.plan(unit, size, tracker, signal);

      this.transition(unit, 'in_progress');
      registered = await this.transfer(unit, size, checksum, strategy, tracker, signal);
      this.transition(unit, 'completed');
    } catch (error) {
      return this.fail(unit, error, tracker);
    }

    this.deps.logger.info('Upload completed', {
      fileName: unit.fileName,
      storageIdentifier: registered.storageIdentifier,
      bytes: unit.size,
      retries: tracker.retries,
    });
    this.emit({
      type: 'unit_completed',
      filepath: unit.filepath,
      storageIdentifier: registered.storageIdentifier,
      retries: tracker.retries,
    });

    return {
      filepath: unit.filepath,
      fileName: unit.fileName,
      status: 'completed',
      success: true,
      storageIdentifier: registered.storageIdentifier,
      ...(registered.fileId !== undefined && { fileId: registered.fileId }),
      retries: tracker.retries,
      chunkRetries: tracker.chunkRetries,
      bytesUploaded: tracker.bytesUploaded,
    };
  }

  /**
   * Stats and hashes the file.
   */
  private async inspect(unit: UploadUnit, signal?: AbortSignal): Promise<{ size: number; checksum: FileChecksum }> {
    const size = await statFile(unit.filepath);
    unit.size = size;

    const checksum = await computeChecksum(unit.filepath, this.deps.config.checksumAlgorithm, signal).catch(
      (error: unknown) => {
        throw wrapError(error, `Hashing ${unit.filepath}`);
      }
    );
    unit.checksum = checksum;

    return { size, checksum };
  }

  /**
   * pending -> planned: allocate and pick a strategy.
   */
  private async plan(
    unit: UploadUnit,
    size: number,
    tracker: UnitTracker,
    signal?: AbortSignal
  ): Promise<UploadStrategy> {
    const ticket = await this.withRetry(
      () => this.deps.service.allocate(size, signal),
      tracker,
      signal,
      `allocate ${unit.fileName}`
    );

    const strategy = selectStrategy(size, ticket, this.deps.config.maxPackageSize);
    unit.storageIdentifier = ticket.storageIdentifier;
    unit.strategy = strategy;

    this.transition(unit, 'planned');
    this.emit({
      type: 'unit_planned',
      filepath: unit.filepath,
      size,
      strategy: strategy.kind,
      chunkCount: transferChunks(strategy, size).length,
    });

    return strategy;
  }

  /**
   * in_progress: move the bytes, finalize and register.
   */
  private async transfer(
    unit: UploadUnit,
    size: number,
    checksum: FileChecksum,
    strategy: UploadStrategy,
    tracker: UnitTracker,
    signal?: AbortSignal
  ): Promise<RegisteredFile> {
    const storageIdentifier = unit.storageIdentifier ?? '';

    if (strategy.kind === 'single') {
      const [chunk] = transferChunks(strategy, size);
      if (chunk) {
        await this.uploadChunk(unit, chunk, strategy.url, false, size, tracker, signal);
      }
    } else {
      let completed = false;
      try {
        const parts = await this.uploadParts(unit, strategy, size, tracker, signal);
        await this.withRetry(
          () => this.deps.service.completeMultipart(strategy.completePath, parts, signal),
          tracker,
          signal,
          `complete ${unit.fileName}`
        );
        completed = true;
      } finally {
        if (!completed) {
          await this.abortMultipart(unit, strategy.abortPath);
        }
      }
    }

    return this.withRetry(
      () => this.deps.service.registerFile(unit.toRegistration(storageIdentifier, checksum), signal),
      tracker,
      signal,
      `register ${unit.fileName}`
    );
  }

  /**
   * Uploads every part through the pool's transfer slots.
   *
   * Once a part fails for good no further attempt of any part starts; parts
   * already in flight run to completion before the error propagates.
   */
  private async uploadParts(
    unit: UploadUnit,
    strategy: Extract<UploadStrategy, { kind: 'multipart' }>,
    size: number,
    tracker: UnitTracker,
    signal?: AbortSignal
  ): Promise<CompletedPart[]> {
    const eTags: string[] = new Array<string>(strategy.chunks.length);
    let firstError: unknown;
    let failed = false;

    const halt: PartHalt = {
      get halted(): boolean {
        return failed;
      },
      fail(error: unknown): void {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      },
    };

    await Promise.all(
      strategy.chunks.map(async (chunk) => {
        const url = strategy.partUrls[chunk.index] ?? '';
        try {
          const eTag = await this.uploadChunk(unit, chunk, url, true, size, tracker, signal, halt);
          eTags[chunk.index] = eTag ?? '';
        } catch (error) {
          halt.fail(error);
        }
      })
    );

    if (failed) {
      throw firstError;
    }

    return eTags.map((eTag, i) => ({ partNumber: i + 1, eTag }));
  }

  /**
   * Uploads one chunk under its own retry budget. Every attempt takes a
   * transfer slot and reopens the byte range; backoff waits hold no slot.
   */
  private async uploadChunk(
    unit: UploadUnit,
    chunk: Chunk,
    url: string,
    requireETag: boolean,
    size: number,
    tracker: UnitTracker,
    signal?: AbortSignal,
    halt?: PartHalt
  ): Promise<string | undefined> {
    const state = new RetryState();
    const partNumber = chunk.index + 1;
    const { pool, retry, service } = this.deps;

    try {
      const eTag = await retry.execute(
        (attempt) =>
          pool.runTransfer(async () => {
            if (halt?.halted) {
              throw CancelledError.aborted(`part ${partNumber} skipped after another part failed`);
            }
            try {
              const tag = await withChunkStream(unit.filepath, chunk, (stream) =>
                service.uploadChunk(url, stream, chunk.length, signal)
              );
              if (requireETag && !tag) {
                throw PackagingError.missingETag(partNumber);
              }
              return tag;
            } catch (error) {
              // marked before the slot is released, so queued attempts see it
              if (!retry.willRetry(error, attempt, signal)) halt?.fail(error);
              throw error;
            }
          }, signal),
        {
          state,
          signal,
          operationName: `part ${partNumber} of ${unit.fileName}`,
          onRetry: (notice) =>
            this.emit({
              type: 'chunk_retry',
              filepath: unit.filepath,
              chunkIndex: chunk.index,
              attempt: notice.attempt,
              delayMs: notice.delayMs,
              error: notice.error,
            }),
        }
      );

      tracker.bytesUploaded += chunk.length;
      this.emit({
        type: 'bytes_transferred',
        filepath: unit.filepath,
        chunkIndex: chunk.index,
        bytes: chunk.length,
        totalBytes: tracker.bytesUploaded,
        size,
      });

      return eTag;
    } finally {
      tracker.chunkRetries[chunk.index] = state.retries;
      tracker.retries += state.retries;
    }
  }

  private async withRetry<T>(
    operation: () => Promise<T>,
    tracker: UnitTracker,
    signal: AbortSignal | undefined,
    operationName: string
  ): Promise<T> {
    const state = new RetryState();
    try {
      return await this.deps.retry.execute(operation, { state, signal, operationName });
    } finally {
      tracker.retries += state.retries;
    }
  }

  /**
   * Best-effort release of an unfinished multipart upload; failures are logged only.
   */
  private async abortMultipart(unit: UploadUnit, abortPath: string): Promise<void> {
    if (!this.deps.config.abortOnFailure) return;

    try {
      await this.deps.service.abortMultipart(abortPath);
      this.deps.logger.debug('Aborted multipart upload', { fileName: unit.fileName });
    } catch (abortError) {
      this.deps.logger.warn('Failed to abort multipart upload', {
        fileName: unit.fileName,
        error: summarizeError(abortError),
      });
    }
  }

  private skip(unit: UploadUnit, fileId: number): UploadResult {
    this.transition(unit, 'skipped');
    this.deps.logger.info('Skipped file already in dataset', { fileName: unit.fileName, fileId });
    this.emit({ type: 'unit_skipped', filepath: unit.filepath, fileId });

    return {
      filepath: unit.filepath,
      fileName: unit.fileName,
      status: 'skipped',
      success: true,
      fileId,
      retries: 0,
      chunkRetries: [],
      bytesUploaded: 0,
    };
  }

  private fail(unit: UploadUnit, error: unknown, tracker: UnitTracker): UploadResult {
    if (!unit.isTerminal) {
      this.transition(unit, 'failed');
    }
    const summary = summarizeError(error);

    this.deps.logger.error('Upload failed', {
      fileName: unit.fileName,
      classification: summary.classification,
      code: summary.code,
      message: summary.message,
    });
    this.emit({ type: 'unit_failed', filepath: unit.filepath, error: summary });

    return {
      filepath: unit.filepath,
      fileName: unit.fileName,
      status: 'failed',
      success: false,
      error: summary,
      retries: tracker.retries,
      chunkRetries: tracker.chunkRetries,
      bytesUploaded: tracker.bytesUploaded,
    };
  }

  private transition(unit: UploadUnit, to: UnitStatus): void {
    const from = unit.status;
    unit.transition(to);
    this.deps.logger.debug(`Unit ${from} -> ${to}`, { fileName: unit.fileName });
  }

  private emit(event: ProgressEvent): void {
    this.observer.onEvent(event);
  }
}

async function statFile(filepath: string): Promise<number> {
  const stats = await stat(filepath).catch((error: unknown) => {
    const wrapped = wrapError(error, `Reading ${filepath}`);
    if (wrapped.code === 'ENOENT') throw ValidationError.fileNotFound(filepath);
    if (wrapped.code === 'EACCES') throw ValidationError.unreadable(filepath, 'permission denied');
    throw wrapped;
  });
  if (!stats.isFile()) {
    throw ValidationError.notAFile(filepath);
  }
  return stats.size;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw CancelledError.aborted('cancelled before start');
  }
}
