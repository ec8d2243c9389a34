/**
 * Upload ticket parsing
 * @module dataverse-direct-upload/direct-upload/tickets
 */

import { z } from 'zod';
import { PackagingError } from '../errors/index.js';
import { formatIssues } from '../config/index.js';
import type { UploadTicket } from './interface.js';

const SingleTicketSchema = z.object({
  url: z.string().min(1),
  storageIdentifier: z.string().min(1),
});

const MultipartTicketSchema = z.object({
  urls: z.record(z.string().regex(/^\d+$/, 'part keys must be part numbers'), z.string().min(1)),
  partSize: z.number().int().positive(),
  complete: z.string().min(1),
  abort: z.string().min(1),
  storageIdentifier: z.string().min(1),
});

const TicketEnvelopeSchema = z.object({
  data: z.unknown(),
});

/**
 * Parses the `uploadurls` response body into an upload ticket.
 *
 * @throws {PackagingError} If the body is not a recognizable ticket
 */
export function parseUploadTicket(body: unknown): UploadTicket {
  const envelope = TicketEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw PackagingError.malformedTicket('response has no data field');
  }

  const data = envelope.data.data;

  if (typeof data === 'object' && data !== null && 'urls' in data) {
    const multipart = MultipartTicketSchema.safeParse(data);
    if (!multipart.success) {
      throw PackagingError.malformedTicket(formatIssues(multipart.error), { issues: multipart.error.issues });
    }
    const { urls, partSize, complete, abort, storageIdentifier } = multipart.data;
    return {
      kind: 'multipart',
      partSize,
      partUrls: orderPartUrls(urls),
      completePath: complete,
      abortPath: abort,
      storageIdentifier,
    };
  }

  const single = SingleTicketSchema.safeParse(data);
  if (!single.success) {
    throw PackagingError.malformedTicket(formatIssues(single.error), { issues: single.error.issues });
  }
  return { kind: 'single', url: single.data.url, storageIdentifier: single.data.storageIdentifier };
}

/**
 * Orders part URLs by part number and checks they run 1..N without gaps.
 */
function orderPartUrls(urls: Record<string, string>): string[] {
  const entries = Object.entries(urls)
    .map(([key, url]) => ({ partNumber: parseInt(key, 10), url }))
    .sort((a, b) => a.partNumber - b.partNumber);

  if (entries.length === 0) {
    throw PackagingError.malformedTicket('multipart ticket carries no part URLs');
  }

  entries.forEach((entry, i) => {
    if (entry.partNumber !== i + 1) {
      throw PackagingError.malformedTicket(
        `part URLs must be numbered 1..${entries.length}, found part ${entry.partNumber} at position ${i + 1}`
      );
    }
  });

  return entries.map((entry) => entry.url);
}
