/**
 * File digests sent with registered files
 * @module dataverse-direct-upload/chunking/checksum
 */

import { createReadStream } from 'node:fs';
import { md5, sha1 } from '@noble/hashes/legacy';
import { sha256, sha512 } from '@noble/hashes/sha2';
import { bytesToHex, type CHash } from '@noble/hashes/utils';
import type { ChecksumAlgorithm } from '../config/index.js';

/**
 * Digest of a file in the shape the controlling API expects
 */
export interface FileChecksum {
  readonly algorithm: ChecksumAlgorithm;
  readonly value: string;
}

const HASHES: Record<ChecksumAlgorithm, CHash> = {
  MD5: md5,
  'SHA-1': sha1,
  'SHA-256': sha256,
  'SHA-512': sha512,
};

/**
 * Hashes a file by streaming it; the file is never held in memory.
 */
export async function computeChecksum(
  filepath: string,
  algorithm: ChecksumAlgorithm,
  signal?: AbortSignal
): Promise<FileChecksum> {
  const hash = HASHES[algorithm].create();
  const stream = createReadStream(filepath, signal ? { signal } : undefined);

  for await (const data of stream) {
    hash.update(data);
  }

  return { algorithm, value: bytesToHex(hash.digest()) };
}

/**
 * Hashes an in-memory buffer.
 */
export function checksumOf(data: Uint8Array | string, algorithm: ChecksumAlgorithm): FileChecksum {
  return {
    algorithm,
    value: bytesToHex(HASHES[algorithm](data)),
  };
}
