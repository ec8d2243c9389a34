/**
 * Tests for the direct upload service
 */

import { FormData } from 'undici';
import { ApiError, AuthError } from '../../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../../transport/index.js';
import { DataverseDirectUploadService, buildJsonData, type FileRegistration } from '../index.js';

const TARGET = {
  dataverseUrl: 'https://dataverse.test',
  persistentId: 'doi:10.5072/FK2/ABC',
  apiToken: 'test-secret',
};

/**
 * Transport stub that records requests and answers from a queue
 */
class StubTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly replies: Array<HttpResponse | Error> = [];

  reply(status: number, body: unknown = '', headers: Record<string, string> = {}): this {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    this.replies.push({ status, headers, body: new TextEncoder().encode(text) });
    return this;
  }

  fail(error: Error): this {
    this.replies.push(error);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`Unexpected request ${request.method} ${request.url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async close(): Promise<void> {}
}

function lastRequest(transport: StubTransport): HttpRequest {
  const request = transport.requests[transport.requests.length - 1];
  if (!request) {
    throw new Error('no request was sent');
  }
  return request;
}

function jsonDataOf(request: HttpRequest): unknown {
  if (!(request.body instanceof FormData)) {
    throw new Error('request body is not a form');
  }
  const field = request.body.get('jsonData');
  if (typeof field !== 'string') {
    throw new Error('jsonData field is missing');
  }
  return JSON.parse(field);
}

const REGISTRATION: FileRegistration = {
  fileName: 'data.csv',
  directoryLabel: 'raw',
  description: 'Raw measurements',
  mimeType: 'text/csv',
  categories: ['DATA'],
  restrict: false,
  tabIngest: true,
  storageIdentifier: 's3://bucket:key',
  checksum: { algorithm: 'MD5', value: '5d41402abc4b2a76b9719d911017c592' },
};

describe('DataverseDirectUploadService', () => {
  let transport: StubTransport;
  let service: DataverseDirectUploadService;

  beforeEach(() => {
    transport = new StubTransport();
    service = new DataverseDirectUploadService(TARGET, transport);
  });

  describe('allocate', () => {
    it('should request upload URLs with the API token', async () => {
      transport.reply(200, {
        status: 'OK',
        data: { url: 'https://storage.test/o', storageIdentifier: 's3://bucket:key' },
      });

      const ticket = await service.allocate(2048);

      expect(ticket).toEqual({ kind: 'single', url: 'https://storage.test/o', storageIdentifier: 's3://bucket:key' });
      const request = lastRequest(transport);
      expect(request.method).toBe('GET');
      expect(request.url).toBe(
        'https://dataverse.test/api/datasets/:persistentId/uploadurls?persistentId=doi%3A10.5072%2FFK2%2FABC&size=2048'
      );
      expect(request.headers).toEqual({ 'X-Dataverse-key': 'test-secret' });
    });

    it('should reject a non-JSON response', async () => {
      transport.reply(200, '<html>maintenance</html>');

      const error = await service.allocate(10).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ code: 'INVALID_RESPONSE', status: 200 });
    });
  });

  describe('uploadChunk', () => {
    it('should PUT to the pre-signed URL without the API token', async () => {
      transport.reply(200, '', { etag: '"part-etag"' });
      const body = new Uint8Array([1, 2, 3, 4, 5]);

      const eTag = await service.uploadChunk('https://storage.test/o?X-Amz-Signature=sig', body, 5);

      expect(eTag).toBe('part-etag');
      const request = lastRequest(transport);
      expect(request.method).toBe('PUT');
      expect(request.url).toBe('https://storage.test/o?X-Amz-Signature=sig');
      expect(request.headers).toEqual({ 'content-length': '5' });
      expect(request.body).toBe(body);
    });

    it('should return undefined when storage sends no ETag', async () => {
      transport.reply(200);
      await expect(service.uploadChunk('https://storage.test/o', new Uint8Array(1), 1)).resolves.toBeUndefined();
    });
  });

  describe('multipart completion', () => {
    it('should PUT the part map to the completion path', async () => {
      transport.reply(200);

      await service.completeMultipart('/api/datasets/mpupload?uploadid=u1&key=k1', [
        { partNumber: 1, eTag: 'e1' },
        { partNumber: 2, eTag: 'e2' },
      ]);

      const request = lastRequest(transport);
      expect(request.method).toBe('PUT');
      expect(request.url).toBe('https://dataverse.test/api/datasets/mpupload?uploadid=u1&key=k1');
      expect(request.headers).toEqual({ 'X-Dataverse-key': 'test-secret', 'content-type': 'application/json' });
      expect(request.body).toBe('{"1":"e1","2":"e2"}');
    });

    it('should refuse an out-of-order part list without sending it', async () => {
      await expect(
        service.completeMultipart('/complete', [
          { partNumber: 2, eTag: 'e2' },
          { partNumber: 1, eTag: 'e1' },
        ])
      ).rejects.toMatchObject({ code: 'INVALID_PART_ORDER' });
      expect(transport.requests).toHaveLength(0);
    });

    it('should DELETE the abort path', async () => {
      transport.reply(204);

      await service.abortMultipart('/api/datasets/mpupload?uploadid=u1&abort=true');

      const request = lastRequest(transport);
      expect(request.method).toBe('DELETE');
      expect(request.url).toBe('https://dataverse.test/api/datasets/mpupload?uploadid=u1&abort=true');
      expect(request.headers).toEqual({ 'X-Dataverse-key': 'test-secret' });
    });
  });

  describe('registerFile', () => {
    it('should POST jsonData to the add endpoint and report the file id', async () => {
      transport.reply(200, { status: 'OK', data: { files: [{ dataFile: { id: 42 } }] } });

      const registered = await service.registerFile(REGISTRATION);

      expect(registered).toEqual({ storageIdentifier: 's3://bucket:key', fileId: 42 });
      const request = lastRequest(transport);
      expect(request.method).toBe('POST');
      expect(request.url).toBe(
        'https://dataverse.test/api/datasets/:persistentId/add?persistentId=doi%3A10.5072%2FFK2%2FABC'
      );
      expect(request.headers).toEqual({ 'X-Dataverse-key': 'test-secret' });
      expect(jsonDataOf(request)).toEqual({
        description: 'Raw measurements',
        directoryLabel: 'raw',
        mimeType: 'text/csv',
        categories: ['DATA'],
        restrict: false,
        storageIdentifier: 's3://bucket:key',
        fileName: 'data.csv',
        checksum: { '@type': 'MD5', '@value': '5d41402abc4b2a76b9719d911017c592' },
        tabIngest: true,
      });
    });

    it('should omit the file id when the response has none', async () => {
      transport.reply(200, { status: 'OK', data: {} });
      await expect(service.registerFile(REGISTRATION)).resolves.toEqual({ storageIdentifier: 's3://bucket:key' });
    });

    it('should POST a replacement to the file endpoint with forceReplace', async () => {
      transport.reply(200, { status: 'OK', data: { files: [{ dataFile: { id: 43 } }] } });

      await service.registerFile({ ...REGISTRATION, fileToReplaceId: 17 });

      const request = lastRequest(transport);
      expect(request.url).toBe('https://dataverse.test/api/files/17/replace');
      expect(jsonDataOf(request)).toMatchObject({ forceReplace: true, storageIdentifier: 's3://bucket:key' });
    });
  });

  describe('listDatasetFiles', () => {
    it('should list the latest version with the API token', async () => {
      transport.reply(200, {
        status: 'OK',
        data: [
          {
            label: 'data.csv',
            directoryLabel: 'raw',
            restricted: false,
            dataFile: { id: 31, checksum: { type: 'MD5', value: '5d41402abc4b2a76b9719d911017c592' } },
          },
          { label: 'readme.txt', dataFile: { id: 32 } },
        ],
      });

      const files = await service.listDatasetFiles();

      expect(files).toEqual([
        {
          fileId: 31,
          label: 'data.csv',
          directoryLabel: 'raw',
          checksum: { type: 'MD5', value: '5d41402abc4b2a76b9719d911017c592' },
        },
        { fileId: 32, label: 'readme.txt', directoryLabel: '' },
      ]);
      const request = lastRequest(transport);
      expect(request.method).toBe('GET');
      expect(request.url).toBe(
        'https://dataverse.test/api/datasets/:persistentId/versions/:latest/files?persistentId=doi%3A10.5072%2FFK2%2FABC'
      );
      expect(request.headers).toEqual({ 'X-Dataverse-key': 'test-secret' });
    });

    it('should reject a listing without file entries', async () => {
      transport.reply(200, { status: 'OK', data: { files: [] } });

      const error = await service.listDatasetFiles().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ code: 'INVALID_RESPONSE', status: 200 });
    });
  });

  describe('supportsDirectUpload', () => {
    it('should ask for a small ticket', async () => {
      transport.reply(200, {
        status: 'OK',
        data: { url: 'https://storage.test/o', storageIdentifier: 's3://bucket:key' },
      });

      await expect(service.supportsDirectUpload()).resolves.toBe(true);
      expect(lastRequest(transport).url).toContain('size=1024');
    });

    it('should report false when the endpoint answers 404', async () => {
      transport.fail(ApiError.unexpectedStatus(404, 'Direct upload not supported'));
      await expect(service.supportsDirectUpload()).resolves.toBe(false);
    });

    it('should propagate other failures', async () => {
      transport.fail(AuthError.rejected(401));
      await expect(service.supportsDirectUpload()).rejects.toBeInstanceOf(AuthError);
    });
  });
});

describe('buildJsonData', () => {
  it('should copy categories rather than sharing them', () => {
    const categories = ['DATA'];
    const jsonData = buildJsonData({ ...REGISTRATION, categories });
    expect(jsonData['categories']).toEqual(['DATA']);
    expect(jsonData['categories']).not.toBe(categories);
  });

  it('should only flag replacements', () => {
    expect(buildJsonData(REGISTRATION)).not.toHaveProperty('forceReplace');
  });
});
