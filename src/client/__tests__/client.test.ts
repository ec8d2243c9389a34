/**
 * Tests for the direct upload client over a mocked HTTP stack
 */

import { MockAgent } from 'undici';
import { ConfigError } from '../../errors/index.js';
import { NoopLogger } from '../../observability/index.js';
import { checksumOf } from '../../chunking/index.js';
import { createInstantSleep, createScratchDir, patternBytes, type ScratchDir } from '../../testing/index.js';
import { createClient, type DirectUploadClient } from '../index.js';

const API = 'https://dataverse.test';
const STORAGE = 'https://storage.test';
const TARGET = { dataverseUrl: API, persistentId: 'doi:10.5072/FK2/ABC', apiToken: 'test-secret' };
const LIST_FILES = '/api/datasets/:persistentId/versions/:latest/files';

interface CapturedRequest {
  path: string;
  headers: unknown;
}

function headerValue(headers: unknown, name: string): string | undefined {
  const wanted = name.toLowerCase();
  if (Array.isArray(headers)) {
    for (let i = 0; i + 1 < headers.length; i += 2) {
      if (String(headers[i]).toLowerCase() === wanted) return String(headers[i + 1]);
    }
    return undefined;
  }
  if (typeof headers === 'object' && headers !== null) {
    for (const [key, value] of Object.entries(headers)) {
      if (key.toLowerCase() === wanted) return String(value);
    }
  }
  return undefined;
}

describe('DirectUploadClient', () => {
  let agent: MockAgent;
  let client: DirectUploadClient;
  let scratch: ScratchDir;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = createClient(
      { nParallelUploads: 1, retry: { maxRetries: 2 } },
      { dispatcher: agent, logger: new NoopLogger(), sleep: createInstantSleep() }
    );
    scratch = await createScratchDir();
  });

  afterEach(async () => {
    if (!client.isClosed()) {
      await client.close();
    }
    await scratch.cleanup();
  });

  it('should allocate, store and register a small file', async () => {
    const filepath = await scratch.writeFile('data.csv', 10);
    const captured: Record<string, CapturedRequest> = {};

    agent
      .get(API)
      .intercept({ path: (path) => path.startsWith(LIST_FILES), method: 'GET' })
      .reply((options) => {
        captured['listing'] = { path: options.path, headers: options.headers };
        return { statusCode: 200, data: JSON.stringify({ status: 'OK', data: [] }) };
      });

    agent
      .get(API)
      .intercept({ path: (path) => path.startsWith('/api/datasets/:persistentId/uploadurls'), method: 'GET' })
      .reply((options) => {
        captured['ticket'] = { path: options.path, headers: options.headers };
        return {
          statusCode: 200,
          data: JSON.stringify({
            status: 'OK',
            data: { url: `${STORAGE}/bucket/key?X-Amz-Signature=sig`, storageIdentifier: 's3://bucket:key' },
          }),
        };
      });

    agent
      .get(STORAGE)
      .intercept({ path: (path) => path.startsWith('/bucket/key'), method: 'PUT' })
      .reply((options) => {
        captured['storage'] = { path: options.path, headers: options.headers };
        return { statusCode: 200, data: '', responseOptions: { headers: { etag: '"stored"' } } };
      });

    agent
      .get(API)
      .intercept({ path: (path) => path.startsWith('/api/datasets/:persistentId/add'), method: 'POST' })
      .reply((options) => {
        captured['register'] = { path: options.path, headers: options.headers };
        return {
          statusCode: 200,
          data: JSON.stringify({ status: 'OK', data: { files: [{ dataFile: { id: 42 } }] } }),
        };
      });

    const batch = await client.upload({ ...TARGET, files: [{ filepath }] });

    expect(batch.success).toBe(true);
    expect(batch.results[0]).toMatchObject({
      fileName: 'data.csv',
      status: 'completed',
      storageIdentifier: 's3://bucket:key',
      fileId: 42,
      bytesUploaded: 10,
    });

    expect(captured['listing']?.path).toBe(`${LIST_FILES}?persistentId=doi%3A10.5072%2FFK2%2FABC`);
    expect(headerValue(captured['listing']?.headers, 'x-dataverse-key')).toBe('test-secret');

    expect(captured['ticket']?.path).toBe(
      '/api/datasets/:persistentId/uploadurls?persistentId=doi%3A10.5072%2FFK2%2FABC&size=10'
    );
    expect(headerValue(captured['ticket']?.headers, 'x-dataverse-key')).toBe('test-secret');

    expect(captured['storage']?.path).toBe('/bucket/key?X-Amz-Signature=sig');
    expect(headerValue(captured['storage']?.headers, 'content-length')).toBe('10');
    expect(headerValue(captured['storage']?.headers, 'x-dataverse-key')).toBeUndefined();

    expect(captured['register']?.path).toBe('/api/datasets/:persistentId/add?persistentId=doi%3A10.5072%2FFK2%2FABC');
    expect(headerValue(captured['register']?.headers, 'x-dataverse-key')).toBe('test-secret');
  });

  it('should retry a throttled ticket request', async () => {
    const filepath = await scratch.writeFile('data.csv', 10);
    const api = agent.get(API);

    api
      .intercept({ path: (path) => path.startsWith(LIST_FILES), method: 'GET' })
      .reply(200, JSON.stringify({ status: 'OK', data: [] }));
    api
      .intercept({ path: (path) => path.startsWith('/api/datasets/:persistentId/uploadurls'), method: 'GET' })
      .reply(429, JSON.stringify({ status: 'ERROR', message: 'Too many requests' }));
    api
      .intercept({ path: (path) => path.startsWith('/api/datasets/:persistentId/uploadurls'), method: 'GET' })
      .reply(
        200,
        JSON.stringify({ status: 'OK', data: { url: `${STORAGE}/bucket/key`, storageIdentifier: 's3://bucket:key' } })
      );
    agent.get(STORAGE).intercept({ path: '/bucket/key', method: 'PUT' }).reply(200, '');
    api
      .intercept({ path: (path) => path.startsWith('/api/datasets/:persistentId/add'), method: 'POST' })
      .reply(200, JSON.stringify({ status: 'OK', data: { files: [{ dataFile: { id: 7 } }] } }));

    const batch = await client.upload({ ...TARGET, files: [{ filepath }] });

    expect(batch.results[0]).toMatchObject({ success: true, retries: 1, fileId: 7 });
  });

  it('should skip a file whose checksum the dataset already holds', async () => {
    const filepath = await scratch.writeFile('data.csv', 10);
    const { value } = checksumOf(patternBytes(10), 'MD5');

    agent
      .get(API)
      .intercept({ path: (path) => path.startsWith(LIST_FILES), method: 'GET' })
      .reply(
        200,
        JSON.stringify({
          status: 'OK',
          data: [{ label: 'older.csv', dataFile: { id: 5, checksum: { type: 'MD5', value } } }],
        })
      );

    const batch = await client.upload({ ...TARGET, files: [{ filepath }] });

    expect(batch).toMatchObject({ success: true, succeeded: 0, skipped: 1, failed: 0 });
    expect(batch.results[0]).toMatchObject({ status: 'skipped', fileId: 5, bytesUploaded: 0 });
  });

  it('should report direct upload support', async () => {
    const api = agent.get(API);
    api
      .intercept({ path: (path) => path.startsWith('/api/datasets/:persistentId/uploadurls'), method: 'GET' })
      .reply(404, JSON.stringify({ status: 'ERROR', message: 'Direct upload not supported for files in this dataset' }));

    await expect(client.supportsDirectUpload(TARGET)).resolves.toBe(false);
  });

  it('should refuse work once closed', async () => {
    await client.close();

    expect(client.isClosed()).toBe(true);
    await expect(client.close()).rejects.toThrow('Client is already closed');
    await expect(client.upload({ ...TARGET, files: [] })).rejects.toThrow('Client is closed');
    await expect(client.supportsDirectUpload(TARGET)).rejects.toThrow('Client is closed');
  });

  it('should expose the normalized configuration', () => {
    expect(client.getConfig()).toMatchObject({
      nParallelUploads: 1,
      maxConcurrentTransfers: 1,
      checksumAlgorithm: 'MD5',
      retry: { maxRetries: 2, minDelayMs: 1000 },
    });
  });
});

describe('createClient', () => {
  it('should reject an invalid configuration', () => {
    expect(() => createClient({ nParallelUploads: 0 }, { logger: new NoopLogger() })).toThrow(ConfigError);
  });
});
