/**
 * Direct upload client
 * @module dataverse-direct-upload/client
 */

import type { NormalizedUploaderConfig } from '../config/index.js';
import { DataverseDirectUploadService, type DatasetTarget } from '../direct-upload/index.js';
import type { Logger, ProgressObserver } from '../observability/index.js';
import type { SleepFunction } from '../resilience/index.js';
import type { HttpTransport } from '../transport/index.js';
import {
  DirectUploadOrchestrator,
  type BatchUploadResult,
  type DirectUploadRequest,
} from '../upload/index.js';

/**
 * Client for uploading files into datasets through direct upload.
 *
 * Owns the HTTP transport; `close()` releases it.
 */
export class DirectUploadClient {
  private readonly orchestrator: DirectUploadOrchestrator;
  private closed = false;

  constructor(
    private readonly config: NormalizedUploaderConfig,
    private readonly transport: HttpTransport,
    private readonly logger: Logger,
    observer?: ProgressObserver,
    sleep?: SleepFunction
  ) {
    this.orchestrator = new DirectUploadOrchestrator({
      config,
      serviceFactory: (target) => this.service(target),
      logger,
      ...(observer && { observer }),
      ...(sleep && { sleep }),
    });
  }

  /**
   * Uploads a batch of files. Resolves with one result per file, in order.
   */
  async upload(request: DirectUploadRequest): Promise<BatchUploadResult> {
    this.assertOpen();
    return this.orchestrator.upload(request);
  }

  /**
   * Whether the dataset's storage accepts direct uploads.
   */
  async supportsDirectUpload(target: DatasetTarget, signal?: AbortSignal): Promise<boolean> {
    this.assertOpen();
    return this.service(target).supportsDirectUpload(signal);
  }

  /**
   * Cancels every batch in flight.
   */
  abortAll(): void {
    this.orchestrator.abortAll();
  }

  getConfig(): NormalizedUploaderConfig {
    return this.config;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Cancels running batches and closes the transport.
   *
   * @throws {Error} If the client is already closed
   */
  async close(): Promise<void> {
    if (this.closed) {
      throw new Error('Client is already closed');
    }
    this.closed = true;
    this.orchestrator.abortAll();
    await this.transport.close();
  }

  private service(target: DatasetTarget): DataverseDirectUploadService {
    return new DataverseDirectUploadService(target, this.transport, this.logger);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Client is closed');
    }
  }
}
