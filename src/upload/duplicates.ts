/**
 * Duplicate detection against a dataset's existing files
 * @module dataverse-direct-upload/upload/duplicates
 */

import { posix } from 'node:path';
import type { FileChecksum } from '../chunking/index.js';
import type { DatasetFile } from '../direct-upload/index.js';
import type { UploadUnit } from './unit.js';

/**
 * What to do with a file given the dataset's current contents
 */
export type DuplicateDecision =
  | { action: 'upload' }
  /** The dataset already holds these exact bytes */
  | { action: 'skip'; fileId: number }
  /** Same path, different bytes: replace the existing file */
  | { action: 'replace'; fileId: number };

/**
 * Lookup of a dataset's files by digest and by path.
 */
export class DatasetFileIndex {
  private readonly byChecksum = new Map<string, number>();
  private readonly byPath = new Map<string, number>();

  constructor(files: readonly DatasetFile[]) {
    for (const file of files) {
      if (file.checksum) {
        this.byChecksum.set(checksumKey(file.checksum.type, file.checksum.value), file.fileId);
      }
      this.byPath.set(datasetPath(file.directoryLabel, file.label), file.fileId);
    }
  }

  /**
   * A matching digest anywhere in the dataset wins over a matching path.
   */
  decide(unit: UploadUnit, checksum: FileChecksum): DuplicateDecision {
    const sameBytes = this.byChecksum.get(checksumKey(checksum.algorithm, checksum.value));
    if (sameBytes !== undefined) {
      return { action: 'skip', fileId: sameBytes };
    }

    const samePath = this.byPath.get(datasetPath(unit.directoryLabel, unit.fileName));
    if (samePath !== undefined) {
      return { action: 'replace', fileId: samePath };
    }

    return { action: 'upload' };
  }
}

function checksumKey(type: string, value: string): string {
  return `${type}:${value.toLowerCase()}`;
}

function datasetPath(directoryLabel: string, label: string): string {
  return posix.join(directoryLabel, label);
}
