/**
 * Tests for chunk streams and checksums
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { createScratchDir, patternBytes, type ScratchDir } from '../../testing/index.js';
import { checksumOf, computeChecksum, openChunkStream, withChunkStream } from '../index.js';

async function readAll(stream: Readable): Promise<Buffer> {
  const buffers: Buffer[] = [];
  for await (const data of stream) {
    buffers.push(Buffer.from(data));
  }
  return Buffer.concat(buffers);
}

describe('chunk streams', () => {
  let scratch: ScratchDir;
  let filepath: string;

  beforeEach(async () => {
    scratch = await createScratchDir();
    filepath = await scratch.writeFile('data.bin', 1000);
  });

  afterEach(async () => {
    await scratch.cleanup();
  });

  it('should read exactly the requested byte range', async () => {
    const data = await readAll(openChunkStream(filepath, { offset: 100, length: 50 }));
    expect(data.equals(patternBytes(50, 100))).toBe(true);
  });

  it('should read the final partial range', async () => {
    const data = await readAll(openChunkStream(filepath, { offset: 900, length: 100 }));
    expect(data).toHaveLength(100);
    expect(data.equals(patternBytes(100, 900))).toBe(true);
  });

  it('should yield an empty stream for a zero-length range', async () => {
    const data = await readAll(openChunkStream(filepath, { offset: 0, length: 0 }));
    expect(data).toHaveLength(0);
  });

  it('should open an independent stream per call', async () => {
    const [first, second] = await Promise.all([
      readAll(openChunkStream(filepath, { offset: 0, length: 10 })),
      readAll(openChunkStream(filepath, { offset: 0, length: 10 })),
    ]);
    expect(first.equals(second)).toBe(true);
  });

  it('should destroy the stream when the callback throws', async () => {
    let captured: Readable | undefined;

    await expect(
      withChunkStream(filepath, { offset: 0, length: 500 }, async (stream) => {
        captured = stream;
        throw new Error('consumer failed');
      })
    ).rejects.toThrow('consumer failed');

    expect(captured?.destroyed).toBe(true);
  });

  it('should return the callback result and destroy the stream', async () => {
    let captured: Readable | undefined;
    const length = await withChunkStream(filepath, { offset: 10, length: 20 }, async (stream) => {
      captured = stream;
      return (await readAll(stream)).length;
    });

    expect(length).toBe(20);
    expect(captured?.destroyed).toBe(true);
  });
});

describe('checksums', () => {
  let scratch: ScratchDir;

  beforeEach(async () => {
    scratch = await createScratchDir();
  });

  afterEach(async () => {
    await scratch.cleanup();
  });

  it('should hash a file with MD5 by streaming it', async () => {
    const filepath = join(scratch.path, 'hello.txt');
    await writeFile(filepath, 'hello');

    await expect(computeChecksum(filepath, 'MD5')).resolves.toEqual({
      algorithm: 'MD5',
      value: '5d41402abc4b2a76b9719d911017c592',
    });
  });

  it('should support SHA-256', () => {
    expect(checksumOf('hello', 'SHA-256').value).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  it('should agree between file and buffer hashing', async () => {
    const filepath = await scratch.writeFile('pattern.bin', 4096);
    const fromFile = await computeChecksum(filepath, 'SHA-1');
    expect(fromFile).toEqual(checksumOf(patternBytes(4096), 'SHA-1'));
  });
});
