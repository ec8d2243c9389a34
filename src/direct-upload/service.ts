/**
 * Direct upload service implementation
 * @module dataverse-direct-upload/direct-upload/service
 */

import type { Readable } from 'node:stream';
import { FormData } from 'undici';
import { z } from 'zod';
import { ApiError, isDirectUploadError } from '../errors/index.js';
import { formatIssues } from '../config/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { bodyText, getETag, type HttpResponse, type HttpTransport } from '../transport/index.js';
import type {
  CompletedPart,
  DatasetFile,
  DirectUploadService,
  FileRegistration,
  RegisteredFile,
  UploadTicket,
} from './interface.js';
import { buildCompletionBody } from './parts.js';
import { parseUploadTicket } from './tickets.js';

export const TICKET_ENDPOINT = '/api/datasets/:persistentId/uploadurls';
export const ADD_FILE_ENDPOINT = '/api/datasets/:persistentId/add';
export const REPLACE_FILE_ENDPOINT = '/api/files/{FILE_ID}/replace';
export const LIST_FILES_ENDPOINT = '/api/datasets/:persistentId/versions/:latest/files';

/** Size of the ticket requested to learn whether direct upload is enabled */
const SUPPORT_CHECK_SIZE = 1024;

/**
 * Dataset that uploads land in, and the credential used for the controlling API
 */
export interface DatasetTarget {
  /** Base URL of the installation, e.g. `https://demo.dataverse.org` */
  readonly dataverseUrl: string;
  readonly persistentId: string;
  readonly apiToken: string;
}

const RegistrationResponseSchema = z.object({
  data: z
    .object({
      files: z
        .array(
          z.object({
            dataFile: z.object({ id: z.number().optional() }).passthrough().optional(),
          }).passthrough()
        )
        .optional(),
    })
    .passthrough()
    .optional(),
});

const DatasetFilesResponseSchema = z.object({
  data: z.array(
    z
      .object({
        label: z.string(),
        directoryLabel: z.string().optional(),
        dataFile: z
          .object({
            id: z.number(),
            checksum: z.object({ type: z.string(), value: z.string() }).optional(),
          })
          .passthrough(),
      })
      .passthrough()
  ),
});

/**
 * DirectUploadService over the controlling API's REST endpoints.
 *
 * Controlling-API calls carry the `X-Dataverse-key` header; storage PUTs carry
 * only what the pre-signed URL authorizes.
 */
export class DataverseDirectUploadService implements DirectUploadService {
  private readonly logger: Logger;

  constructor(
    private readonly target: DatasetTarget,
    private readonly transport: HttpTransport,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoopLogger();
  }

  async allocate(size: number, signal?: AbortSignal): Promise<UploadTicket> {
    const response = await this.transport.send({
      method: 'GET',
      url: this.ticketUrl(size),
      headers: this.apiHeaders(),
      signal,
    });

    return parseUploadTicket(this.parseJson(response, 'upload ticket'));
  }

  async uploadChunk(
    url: string,
    body: Readable | Uint8Array,
    length: number,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const response = await this.transport.send({
      method: 'PUT',
      url,
      headers: { 'content-length': String(length) },
      body,
      signal,
    });

    return getETag(response.headers);
  }

  async completeMultipart(
    completePath: string,
    parts: readonly CompletedPart[],
    signal?: AbortSignal
  ): Promise<void> {
    const body = buildCompletionBody(parts);

    await this.transport.send({
      method: 'PUT',
      url: this.resolve(completePath),
      headers: { ...this.apiHeaders(), 'content-type': 'application/json' },
      body,
      signal,
    });
  }

  async abortMultipart(abortPath: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send({
      method: 'DELETE',
      url: this.resolve(abortPath),
      headers: this.apiHeaders(),
      signal,
    });
  }

  async registerFile(registration: FileRegistration, signal?: AbortSignal): Promise<RegisteredFile> {
    const form = new FormData();
    form.append('jsonData', JSON.stringify(buildJsonData(registration)));

    const response = await this.transport.send({
      method: 'POST',
      url: this.registrationUrl(registration),
      headers: this.apiHeaders(),
      body: form,
      signal,
    });

    const parsed = RegistrationResponseSchema.safeParse(this.parseJson(response, 'registration'));
    const fileId = parsed.success ? parsed.data.data?.files?.[0]?.dataFile?.id : undefined;

    this.logger.debug('Registered file with dataset', {
      fileName: registration.fileName,
      storageIdentifier: registration.storageIdentifier,
      fileId,
    });

    return {
      storageIdentifier: registration.storageIdentifier,
      ...(fileId !== undefined && { fileId }),
    };
  }

  async listDatasetFiles(signal?: AbortSignal): Promise<DatasetFile[]> {
    const url = new URL(LIST_FILES_ENDPOINT, this.target.dataverseUrl);
    url.searchParams.set('persistentId', this.target.persistentId);

    const response = await this.transport.send({
      method: 'GET',
      url: url.toString(),
      headers: this.apiHeaders(),
      signal,
    });

    const parsed = DatasetFilesResponseSchema.safeParse(this.parseJson(response, 'file listing'));
    if (!parsed.success) {
      throw new ApiError({
        message: `Malformed file listing: ${formatIssues(parsed.error)}`,
        code: 'INVALID_RESPONSE',
        status: response.status,
        details: { issues: parsed.error.issues },
      });
    }

    return parsed.data.data.map((entry) => ({
      fileId: entry.dataFile.id,
      label: entry.label,
      directoryLabel: entry.directoryLabel ?? '',
      ...(entry.dataFile.checksum && { checksum: entry.dataFile.checksum }),
    }));
  }

  async supportsDirectUpload(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.allocate(SUPPORT_CHECK_SIZE, signal);
      return true;
    } catch (error) {
      if (isDirectUploadError(error) && error.status === 404) {
        return false;
      }
      throw error;
    }
  }

  private apiHeaders(): Record<string, string> {
    return { 'X-Dataverse-key': this.target.apiToken };
  }

  private ticketUrl(size: number): string {
    const url = new URL(TICKET_ENDPOINT, this.target.dataverseUrl);
    url.searchParams.set('persistentId', this.target.persistentId);
    url.searchParams.set('size', String(size));
    return url.toString();
  }

  private registrationUrl(registration: FileRegistration): string {
    if (registration.fileToReplaceId !== undefined) {
      const path = REPLACE_FILE_ENDPOINT.replace('{FILE_ID}', encodeURIComponent(String(registration.fileToReplaceId)));
      return new URL(path, this.target.dataverseUrl).toString();
    }
    const url = new URL(ADD_FILE_ENDPOINT, this.target.dataverseUrl);
    url.searchParams.set('persistentId', this.target.persistentId);
    return url.toString();
  }

  private resolve(path: string): string {
    return new URL(path, this.target.dataverseUrl).toString();
  }

  private parseJson(response: HttpResponse, what: string): unknown {
    const text = bodyText(response);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ApiError({
        message: `Controlling API returned a non-JSON ${what} response`,
        code: 'INVALID_RESPONSE',
        status: response.status,
        cause: error,
      });
    }
  }
}

/**
 * Builds the `jsonData` form field describing a stored file.
 */
export function buildJsonData(registration: FileRegistration): Record<string, unknown> {
  return {
    description: registration.description,
    directoryLabel: registration.directoryLabel,
    mimeType: registration.mimeType,
    categories: [...registration.categories],
    restrict: registration.restrict,
    storageIdentifier: registration.storageIdentifier,
    fileName: registration.fileName,
    checksum: {
      '@type': registration.checksum.algorithm,
      '@value': registration.checksum.value,
    },
    tabIngest: registration.tabIngest,
    ...(registration.fileToReplaceId !== undefined && { forceReplace: true }),
  };
}
