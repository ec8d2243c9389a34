/**
 * Tests for how a unit reports files it cannot stat
 */

import type { PathLike } from 'node:fs';
import {
  FakeDirectUploadService,
  createInstantSleep,
  createScratchDir,
  createTestConfig,
  type ScratchDir,
} from '../../testing/index.js';
import { DirectUploadOrchestrator } from '../index.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    stat: vi.fn(async (path: PathLike) => {
      if (String(path).endsWith('locked.bin')) {
        throw Object.assign(new Error(`EACCES: permission denied, stat '${String(path)}'`), { code: 'EACCES' });
      }
      return actual.stat(path);
    }),
  };
});

describe('UnitRunner file checks', () => {
  let scratch: ScratchDir;

  beforeEach(async () => {
    scratch = await createScratchDir();
  });

  afterEach(async () => {
    await scratch.cleanup();
  });

  it('should report a file it may not read as unreadable', async () => {
    const service = new FakeDirectUploadService();
    const orchestrator = new DirectUploadOrchestrator({
      config: createTestConfig(),
      serviceFactory: () => service,
      sleep: createInstantSleep(),
    });
    const locked = await scratch.writeFile('locked.bin', 10);
    const readable = await scratch.writeFile('open.bin', 10);

    const batch = await orchestrator.upload({
      persistentId: 'doi:10.5072/FK2/ABC',
      dataverseUrl: 'https://dataverse.test',
      apiToken: 'test-secret',
      files: [{ filepath: locked }, { filepath: readable }],
    });

    expect(batch.results[0]?.error).toEqual({
      classification: 'validation',
      code: 'FILE_UNREADABLE',
      message: `File ${locked} cannot be read: permission denied`,
    });
    expect(batch.results[1]?.status).toBe('completed');
    expect(service.callsTo('allocate')).toHaveLength(1);
  });
});
