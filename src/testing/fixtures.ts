/**
 * Test fixtures
 * @module dataverse-direct-upload/testing/fixtures
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { normalizeConfig, type NormalizedUploaderConfig, type UploaderConfig } from '../config/index.js';
import type { SleepFunction } from '../resilience/index.js';

/**
 * Scratch directory under the OS temp dir
 */
export interface ScratchDir {
  readonly path: string;
  /** Writes a file of `size` deterministic bytes and returns its path */
  writeFile(name: string, size: number): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createScratchDir(prefix = 'direct-upload-'): Promise<ScratchDir> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return {
    path,
    async writeFile(name: string, size: number): Promise<string> {
      const filepath = join(path, name);
      await writeFile(filepath, patternBytes(size));
      return filepath;
    },
    async cleanup(): Promise<void> {
      await rm(path, { recursive: true, force: true });
    },
  };
}

/**
 * `size` bytes where byte `i` is `i % 251`, so misplaced ranges show up
 */
export function patternBytes(size: number, offset = 0): Buffer {
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    data[i] = (offset + i) % 251;
  }
  return data;
}

/**
 * Create a test configuration with sensible defaults
 */
export function createTestConfig(overrides: Partial<UploaderConfig> = {}): NormalizedUploaderConfig {
  return normalizeConfig({
    nParallelUploads: 2,
    maxPackageSize: 64 * 1024,
    timeoutMs: 5000,
    ...overrides,
    retry: { maxRetries: 3, minDelayMs: 1, maxDelayMs: 10, ...overrides.retry },
  });
}

/**
 * Sleep replacement that returns immediately and records requested delays
 */
export function createInstantSleep(): SleepFunction & { delays: number[] } {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return Object.assign(sleep, { delays });
}
