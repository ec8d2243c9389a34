/**
 * Chunk planning, reading and hashing
 * @module dataverse-direct-upload/chunking
 */

export { planChunks, assertChunkCoverage, type Chunk } from './planner.js';
export { openChunkStream, withChunkStream } from './reader.js';
export { computeChecksum, checksumOf, type FileChecksum } from './checksum.js';
