/**
 * Counting semaphore used to bound concurrent work
 * @module dataverse-direct-upload/resilience/semaphore
 */

import { CancelledError } from '../errors/index.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore with FIFO hand-off.
 *
 * A released permit goes straight to the oldest waiter, so `active`
 * never exceeds `capacity`.
 */
export class Semaphore {
  private permits: number;
  private readonly waiting: Waiter[] = [];
  private activeCount = 0;
  private peakCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.permits = capacity;
  }

  /** Permits currently held */
  get active(): number {
    return this.activeCount;
  }

  /** Highest number of permits held at once */
  get peak(): number {
    return this.peakCount;
  }

  /** Callers waiting for a permit */
  get pending(): number {
    return this.waiting.length;
  }

  /**
   * Acquire a permit, waiting if necessary.
   *
   * @throws {CancelledError} If the signal aborts before a permit is granted
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(CancelledError.aborted('cancelled while waiting for a slot'));
    }

    if (this.permits > 0) {
      this.permits--;
      this.markAcquired();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (signal) {
        waiter.signal = signal;
        waiter.onAbort = () => {
          const index = this.waiting.indexOf(waiter);
          if (index >= 0) {
            this.waiting.splice(index, 1);
            reject(CancelledError.aborted('cancelled while waiting for a slot'));
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiting.push(waiter);
    });
  }

  /**
   * Release a permit, potentially unblocking a waiting caller
   */
  release(): void {
    this.activeCount--;
    const next = this.waiting.shift();
    if (next) {
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      this.markAcquired();
      next.resolve();
      return;
    }
    this.permits++;
  }

  /**
   * Runs `task` while holding a permit.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private markAcquired(): void {
    this.activeCount++;
    if (this.activeCount > this.peakCount) {
      this.peakCount = this.activeCount;
    }
  }
}
