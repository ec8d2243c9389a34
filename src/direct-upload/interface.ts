/**
 * Direct upload service interface
 * @module dataverse-direct-upload/direct-upload/interface
 */

import type { Readable } from 'node:stream';
import type { FileChecksum } from '../chunking/index.js';

/**
 * Upload ticket issued by the controlling API for one file
 */
export type UploadTicket = SingleUploadTicket | MultipartUploadTicket;

export interface SingleUploadTicket {
  readonly kind: 'single';
  readonly url: string;
  readonly storageIdentifier: string;
}

export interface MultipartUploadTicket {
  readonly kind: 'multipart';
  /** Negotiated part size in bytes */
  readonly partSize: number;
  /** Pre-signed part URLs ordered by part number (index 0 is part 1) */
  readonly partUrls: readonly string[];
  /** Path (relative to the API base) that finalizes the upload */
  readonly completePath: string;
  /** Path (relative to the API base) that releases the upload */
  readonly abortPath: string;
  readonly storageIdentifier: string;
}

/**
 * An uploaded part and its integrity token
 */
export interface CompletedPart {
  /** 1-based part number */
  readonly partNumber: number;
  readonly eTag: string;
}

/**
 * File metadata sent when registering stored bytes with a dataset
 */
export interface FileRegistration {
  readonly fileName: string;
  readonly directoryLabel: string;
  readonly description: string;
  readonly mimeType: string;
  readonly categories: readonly string[];
  readonly restrict: boolean;
  readonly tabIngest: boolean;
  readonly storageIdentifier: string;
  readonly checksum: FileChecksum;
  /** When set, the registration replaces this existing dataset file */
  readonly fileToReplaceId?: string | number;
}

/**
 * Result of a successful registration
 */
export interface RegisteredFile {
  readonly storageIdentifier: string;
  /** Dataset file id, when the controlling API reports one */
  readonly fileId?: number;
}

/**
 * A file already present in the dataset's latest version
 */
export interface DatasetFile {
  readonly fileId: number;
  readonly label: string;
  /** Folder inside the dataset; empty at the root */
  readonly directoryLabel: string;
  /** Stored digest, when the installation reports one */
  readonly checksum?: { readonly type: string; readonly value: string };
}

/**
 * Direct upload operations against the controlling API and object storage.
 *
 * Every method is a single exchange; retries belong to the caller.
 */
export interface DirectUploadService {
  /**
   * Requests upload URLs for a file of `size` bytes.
   */
  allocate(size: number, signal?: AbortSignal): Promise<UploadTicket>;

  /**
   * Streams `length` bytes to a pre-signed storage URL.
   *
   * @returns The ETag reported by storage, quotes removed
   */
  uploadChunk(
    url: string,
    body: Readable | Uint8Array,
    length: number,
    signal?: AbortSignal
  ): Promise<string | undefined>;

  /**
   * Finalizes a multipart upload. Parts must be 1..N in ascending order.
   */
  completeMultipart(completePath: string, parts: readonly CompletedPart[], signal?: AbortSignal): Promise<void>;

  /**
   * Releases the storage held by an unfinished multipart upload.
   */
  abortMultipart(abortPath: string, signal?: AbortSignal): Promise<void>;

  /**
   * Registers stored bytes as a dataset file.
   */
  registerFile(registration: FileRegistration, signal?: AbortSignal): Promise<RegisteredFile>;

  /**
   * Lists the files of the dataset's latest version.
   */
  listDatasetFiles(signal?: AbortSignal): Promise<DatasetFile[]>;

  /**
   * Whether the dataset's storage accepts direct uploads.
   */
  supportsDirectUpload(signal?: AbortSignal): Promise<boolean>;
}
