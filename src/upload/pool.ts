/**
 * Two-level worker pool for units and byte transfers
 * @module dataverse-direct-upload/upload/pool
 */

import { Semaphore } from '../resilience/index.js';

/**
 * Concurrency counters for a pool
 */
export interface PoolStats {
  activeUnits: number;
  peakUnits: number;
  activeTransfers: number;
  peakTransfers: number;
}

/**
 * Bounds concurrent units and concurrent transfers independently.
 *
 * A unit holds one unit slot for its whole life and borrows a transfer slot
 * per chunk. Transfers never wait on unit slots, so the two ceilings cannot
 * deadlock.
 */
export class WorkerPool {
  private readonly units: Semaphore;
  private readonly transfers: Semaphore;

  constructor(nParallelUploads: number, maxConcurrentTransfers: number = nParallelUploads) {
    this.units = new Semaphore(nParallelUploads);
    this.transfers = new Semaphore(maxConcurrentTransfers);
  }

  runUnit<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.units.run(task, signal);
  }

  runTransfer<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.transfers.run(task, signal);
  }

  stats(): PoolStats {
    return {
      activeUnits: this.units.active,
      peakUnits: this.units.peak,
      activeTransfers: this.transfers.active,
      peakTransfers: this.transfers.peak,
    };
  }
}
