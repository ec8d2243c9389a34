/**
 * Upload unit model
 * @module dataverse-direct-upload/upload/unit
 */

import { basename, resolve } from 'node:path';
import { z } from 'zod';
import { PackagingError, ValidationError } from '../errors/index.js';
import { formatIssues } from '../config/index.js';
import type { FileChecksum } from '../chunking/index.js';
import type { FileRegistration } from '../direct-upload/index.js';
import type { UploadStrategy } from './strategy.js';

/**
 * Lifecycle of a unit. `completed`, `skipped` and `failed` are terminal.
 */
export type UnitStatus = 'pending' | 'planned' | 'in_progress' | 'completed' | 'skipped' | 'failed';

const TRANSITIONS: Record<UnitStatus, readonly UnitStatus[]> = {
  pending: ['planned', 'skipped', 'failed'],
  planned: ['in_progress', 'failed'],
  in_progress: ['completed', 'failed'],
  completed: [],
  skipped: [],
  failed: [],
};

/**
 * Caller-supplied description of one file to upload
 */
export interface FileDescriptor {
  filepath: string;
  fileName?: string;
  directoryLabel?: string;
  description?: string;
  mimeType?: string;
  categories?: string[];
  restrict?: boolean;
  tabIngest?: boolean;
  /** Dataset file id to replace instead of adding a new file */
  fileToReplaceId?: string | number;
}

export const FileDescriptorSchema = z.object({
  filepath: z.string().min(1, 'filepath is required'),
  fileName: z.string().min(1).optional(),
  directoryLabel: z.string().optional(),
  description: z.string().optional(),
  mimeType: z.string().min(1).optional(),
  categories: z.array(z.string()).optional(),
  restrict: z.boolean().optional(),
  tabIngest: z.boolean().optional(),
  fileToReplaceId: z.union([z.string().min(1), z.number().int().positive()]).optional(),
});

/**
 * One file moving through the upload pipeline. Owned by a single runner.
 */
export class UploadUnit {
  readonly filepath: string;
  readonly fileName: string;
  readonly directoryLabel: string;
  readonly description: string;
  readonly mimeType: string;
  readonly categories: readonly string[];
  readonly restrict: boolean;
  readonly tabIngest: boolean;
  /** Set from the descriptor, or filled in when the dataset already has a file at this path */
  fileToReplaceId?: string | number;

  size?: number;
  checksum?: FileChecksum;
  storageIdentifier?: string;
  strategy?: UploadStrategy;

  private currentStatus: UnitStatus = 'pending';

  constructor(descriptor: FileDescriptor) {
    this.filepath = resolve(descriptor.filepath);
    this.fileName = descriptor.fileName ?? basename(this.filepath);
    this.directoryLabel = descriptor.directoryLabel ?? '';
    this.description = descriptor.description ?? '';
    this.mimeType = descriptor.mimeType ?? 'text/plain';
    this.categories = Object.freeze([...(descriptor.categories ?? ['DATA'])]);
    this.restrict = descriptor.restrict ?? false;
    this.tabIngest = descriptor.tabIngest ?? true;
    if (descriptor.fileToReplaceId !== undefined) {
      this.fileToReplaceId = descriptor.fileToReplaceId;
    }
  }

  /**
   * Validates an untrusted descriptor and builds a unit from it.
   *
   * @throws {ValidationError} If the descriptor is malformed
   */
  static fromDescriptor(input: unknown): UploadUnit {
    const parsed = FileDescriptorSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError({
        message: `Invalid file descriptor: ${formatIssues(parsed.error)}`,
        code: 'INVALID_DESCRIPTOR',
        details: { issues: parsed.error.issues },
      });
    }
    return new UploadUnit(parsed.data);
  }

  get status(): UnitStatus {
    return this.currentStatus;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.currentStatus].length === 0;
  }

  /**
   * @throws {PackagingError} If `to` is not reachable from the current status
   */
  transition(to: UnitStatus): void {
    if (!TRANSITIONS[this.currentStatus].includes(to)) {
      throw PackagingError.invalidTransition(this.currentStatus, to);
    }
    this.currentStatus = to;
  }

  /**
   * Metadata for registering the stored bytes with the dataset.
   */
  toRegistration(storageIdentifier: string, checksum: FileChecksum): FileRegistration {
    return {
      fileName: this.fileName,
      directoryLabel: this.directoryLabel,
      description: this.description,
      mimeType: this.mimeType,
      categories: this.categories,
      restrict: this.restrict,
      tabIngest: this.tabIngest,
      storageIdentifier,
      checksum,
      ...(this.fileToReplaceId !== undefined && { fileToReplaceId: this.fileToReplaceId }),
    };
  }
}
