/**
 * Scoped byte-range streams over local files
 * @module dataverse-direct-upload/chunking/reader
 */

import { createReadStream, type ReadStream } from 'node:fs';
import { Readable } from 'node:stream';
import type { Chunk } from './planner.js';

/**
 * Opens a stream of exactly `chunk.length` bytes starting at `chunk.offset`.
 *
 * Every call opens its own file handle; the handle closes when the stream
 * ends, errors or is destroyed. A zero-length chunk yields an empty stream
 * without touching the file.
 */
export function openChunkStream(filepath: string, chunk: Pick<Chunk, 'offset' | 'length'>): Readable {
  if (chunk.length === 0) {
    return Readable.from([]);
  }

  const stream: ReadStream = createReadStream(filepath, {
    start: chunk.offset,
    end: chunk.offset + chunk.length - 1,
    highWaterMark: 64 * 1024,
  });
  return stream;
}

/**
 * Runs `fn` with a fresh chunk stream and destroys the stream afterwards,
 * whether `fn` resolved, rejected or left it unconsumed.
 */
export async function withChunkStream<T>(
  filepath: string,
  chunk: Pick<Chunk, 'offset' | 'length'>,
  fn: (stream: Readable) => Promise<T>
): Promise<T> {
  const stream = openChunkStream(filepath, chunk);
  try {
    return await fn(stream);
  } finally {
    if (!stream.destroyed) {
      stream.destroy();
    }
  }
}
