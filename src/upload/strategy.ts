/**
 * Single-shot or multipart decision for one file
 * @module dataverse-direct-upload/upload/strategy
 */

import { PackagingError } from '../errors/index.js';
import { assertChunkCoverage, planChunks, type Chunk } from '../chunking/index.js';
import type { UploadTicket } from '../direct-upload/index.js';

export type UploadStrategy =
  | { readonly kind: 'single'; readonly url: string }
  | {
      readonly kind: 'multipart';
      readonly partSize: number;
      readonly chunks: readonly Chunk[];
      readonly partUrls: readonly string[];
      readonly completePath: string;
      readonly abortPath: string;
    };

/**
 * Picks the transfer strategy for a file of `size` bytes from its ticket.
 *
 * A single URL is accepted up to and including `maxPackageSize` bytes.
 * A multipart ticket must carry exactly one URL per planned chunk.
 *
 * @throws {PackagingError} On an oversized single URL or a part count mismatch
 */
export function selectStrategy(size: number, ticket: UploadTicket, maxPackageSize: number): UploadStrategy {
  if (ticket.kind === 'single') {
    if (size > maxPackageSize) {
      throw PackagingError.singleUrlTooLarge(size, maxPackageSize);
    }
    return { kind: 'single', url: ticket.url };
  }

  const chunks = planChunks(size, ticket.partSize);
  assertChunkCoverage(chunks, size, ticket.partSize);

  if (chunks.length !== ticket.partUrls.length) {
    throw PackagingError.partCountMismatch(chunks.length, ticket.partUrls.length);
  }

  return {
    kind: 'multipart',
    partSize: ticket.partSize,
    chunks,
    partUrls: ticket.partUrls,
    completePath: ticket.completePath,
    abortPath: ticket.abortPath,
  };
}

/**
 * Chunks moved by a strategy; a single-shot upload is one chunk covering the file.
 */
export function transferChunks(strategy: UploadStrategy, size: number): readonly Chunk[] {
  return strategy.kind === 'single' ? [{ index: 0, offset: 0, length: size }] : strategy.chunks;
}
