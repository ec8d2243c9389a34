/**
 * Byte-range planning for multipart uploads
 * @module dataverse-direct-upload/chunking/planner
 */

import { PackagingError, ValidationError } from '../errors/index.js';

/**
 * A contiguous byte range of a file, uploaded as one part.
 *
 * `index` is zero-based; the part number sent to storage is `index + 1`.
 */
export interface Chunk {
  readonly index: number;
  readonly offset: number;
  readonly length: number;
}

/**
 * Splits `size` bytes into consecutive chunks of `partSize` bytes.
 *
 * Only the last chunk may be shorter. A zero-byte file yields no chunks.
 *
 * @example
 * ```typescript
 * planChunks(10 * MiB, 4 * MiB);
 * // [{ index: 0, offset: 0, length: 4 MiB },
 * //  { index: 1, offset: 4 MiB, length: 4 MiB },
 * //  { index: 2, offset: 8 MiB, length: 2 MiB }]
 * ```
 *
 * @throws {ValidationError} If size is negative or not an integer, or partSize is not positive
 */
export function planChunks(size: number, partSize: number): Chunk[] {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw ValidationError.invalidParameter('size', `File size must be a non-negative integer, got ${size}`);
  }
  if (!Number.isFinite(partSize) || partSize <= 0) {
    throw ValidationError.invalidParameter('partSize', `Part size must be positive, got ${partSize}`);
  }

  const chunks: Chunk[] = [];
  let offset = 0;

  while (offset < size) {
    const length = Math.min(partSize, size - offset);
    chunks.push({ index: chunks.length, offset, length });
    offset += length;
  }

  return chunks;
}

/**
 * Re-checks that chunks tile `[0, size)` exactly, in order.
 *
 * @throws {PackagingError} On a gap, overlap, oversized chunk or short interior chunk
 */
export function assertChunkCoverage(chunks: readonly Chunk[], size: number, partSize: number): void {
  let expectedOffset = 0;

  chunks.forEach((chunk, i) => {
    const isLast = i === chunks.length - 1;
    if (chunk.index !== i) {
      throw PackagingError.invalidPartOrder(`Chunk at position ${i} has index ${chunk.index}`);
    }
    if (chunk.offset !== expectedOffset) {
      throw PackagingError.invalidPartOrder(
        `Chunk ${i} starts at ${chunk.offset}, expected ${expectedOffset}`
      );
    }
    if (chunk.length <= 0 || chunk.length > partSize || (!isLast && chunk.length !== partSize)) {
      throw PackagingError.invalidPartOrder(`Chunk ${i} has invalid length ${chunk.length}`);
    }
    expectedOffset += chunk.length;
  });

  if (expectedOffset !== size) {
    throw PackagingError.invalidPartOrder(`Chunks cover ${expectedOffset} of ${size} bytes`);
  }
}
