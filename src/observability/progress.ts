/**
 * Progress reporting for direct uploads
 * @module dataverse-direct-upload/observability/progress
 */

import { summarizeError, type ErrorSummary } from '../errors/index.js';
import type { Logger } from './logging.js';

/**
 * Events emitted while a batch uploads. Per file, nothing follows
 * `unit_completed`, `unit_skipped` or `unit_failed`.
 */
export type ProgressEvent =
  | { type: 'unit_started'; filepath: string; fileName: string }
  | {
      type: 'unit_planned';
      filepath: string;
      size: number;
      strategy: 'single' | 'multipart';
      chunkCount: number;
    }
  | {
      type: 'bytes_transferred';
      filepath: string;
      chunkIndex: number;
      bytes: number;
      totalBytes: number;
      size: number;
    }
  | {
      type: 'chunk_retry';
      filepath: string;
      chunkIndex: number;
      attempt: number;
      delayMs: number;
      error: ErrorSummary;
    }
  | { type: 'unit_completed'; filepath: string; storageIdentifier: string; retries: number }
  /** The dataset already holds the file's bytes as `fileId` */
  | { type: 'unit_skipped'; filepath: string; fileId: number }
  | { type: 'unit_failed'; filepath: string; error: ErrorSummary };

export type ProgressEventType = ProgressEvent['type'];

/**
 * Receives progress events. Called synchronously on the event loop.
 */
export interface ProgressObserver {
  onEvent(event: ProgressEvent): void;
}

/**
 * Observer that discards every event.
 */
export const NOOP_PROGRESS_OBSERVER: ProgressObserver = {
  onEvent(): void {},
};

/**
 * Wraps an observer so that an exception thrown from `onEvent` is logged at
 * warn and never reaches the upload that emitted the event.
 */
export function guardObserver(observer: ProgressObserver, logger: Logger): ProgressObserver {
  return {
    onEvent(event: ProgressEvent): void {
      try {
        observer.onEvent(event);
      } catch (error) {
        logger.warn('Progress observer failed', {
          event: event.type,
          filepath: event.filepath,
          error: summarizeError(error),
        });
      }
    },
  };
}

/**
 * Collects events in memory; handy for assertions and batch summaries.
 */
export class RecordingProgressObserver implements ProgressObserver {
  readonly events: ProgressEvent[] = [];

  onEvent(event: ProgressEvent): void {
    this.events.push(event);
  }

  ofType<T extends ProgressEventType>(type: T): Extract<ProgressEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<ProgressEvent, { type: T }> => event.type === type);
  }

  forFile(filepath: string): ProgressEvent[] {
    return this.events.filter((event) => event.filepath === filepath);
  }
}
