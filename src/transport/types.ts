/**
 * HTTP transport type definitions for direct uploads
 * @module dataverse-direct-upload/transport/types
 */

import type { Readable } from 'node:stream';
import type { FormData } from 'undici';

/**
 * HTTP methods used by the direct upload protocol
 */
export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  headers: Record<string, string>;
  /** Streams are consumed once; a retry needs a fresh request */
  body?: string | Uint8Array | Readable | FormData;
  signal?: AbortSignal;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  status: number;
  /** Header names are lower-case */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * HTTP transport interface.
 *
 * Implementations perform exactly one exchange per call and reject with a
 * DirectUploadError for status >= 400 or a transport failure. They never retry.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Extracts the ETag with surrounding quotes removed
 */
export function getETag(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'etag')?.replace(/^"|"$/g, '');
}

/**
 * Extracts Retry-After in seconds; accepts delta-seconds or an HTTP date
 */
export function getRetryAfter(headers: Record<string, string>, now: number = Date.now()): number | undefined {
  const value = getHeader(headers, 'retry-after');
  if (!value) return undefined;

  if (/^\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, Math.floor((date.getTime() - now) / 1000));
  }

  return undefined;
}

/**
 * Decodes a response body as UTF-8 text
 */
export function bodyText(response: Pick<HttpResponse, 'body'>): string {
  return new TextDecoder().decode(response.body);
}

/**
 * Pulls a human-readable message out of an error body.
 *
 * The controlling API answers errors with `{"status":"ERROR","message":"..."}`;
 * storage providers answer with XML or plain text.
 */
export function extractErrorMessage(body: Uint8Array, maxLength = 500): string | undefined {
  const text = new TextDecoder().decode(body).trim();
  if (text.length === 0) return undefined;

  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
      return parsed.message;
    }
  } catch {
    // not JSON; fall through to raw text
  }

  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Origin and path of a URL, dropping the query (pre-signed URLs carry credentials there)
 */
export function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return '<invalid url>';
  }
}
