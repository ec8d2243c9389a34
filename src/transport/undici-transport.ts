/**
 * undici-based HTTP transport implementation for direct uploads
 * @module dataverse-direct-upload/transport/undici-transport
 */

import { request, type Dispatcher } from 'undici';
import { CancelledError, mapHttpStatusToError, wrapError, isDirectUploadError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { describeUrl, extractErrorMessage, getRetryAfter } from './types.js';

/**
 * undici transport options
 */
export interface UndiciTransportOptions {
  /** Headers and body timeout in milliseconds */
  timeoutMs: number;
  /** Dispatcher to route requests through; undici's global agent when omitted */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * HTTP transport over undici's `request`.
 *
 * Bodies may be streams; they are piped as-is, so a file chunk is never
 * buffered in memory.
 */
export class UndiciTransport implements HttpTransport {
  private readonly options: UndiciTransportOptions;
  private readonly logger: Logger;

  constructor(options: UndiciTransportOptions) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const target = `${req.method} ${describeUrl(req.url)}`;
    this.logger.debug(`HTTP ${target}`);

    let status: number;
    let headers: Record<string, string>;
    let body: Uint8Array;

    try {
      const response = await request(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: req.signal,
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
      });

      status = response.statusCode;
      headers = convertHeaders(response.headers);
      body = new Uint8Array(await response.body.arrayBuffer());
    } catch (error) {
      throw this.handleError(error, req, target);
    }

    this.logger.debug(`HTTP ${target} -> ${status}`);

    if (status >= 400) {
      throw mapHttpStatusToError(status, extractErrorMessage(body), getRetryAfter(headers));
    }

    return { status, headers, body };
  }

  /**
   * Closes the dispatcher if one was supplied
   */
  async close(): Promise<void> {
    if (this.options.dispatcher) {
      await this.options.dispatcher.close();
    }
  }

  private handleError(error: unknown, req: HttpRequest, target: string): Error {
    if (req.signal?.aborted) {
      return isDirectUploadError(error) && error.type === 'cancelled'
        ? error
        : new CancelledError({ message: `${target} aborted`, code: 'ABORTED', cause: error });
    }
    return wrapError(error, target);
  }
}

/**
 * Flattens Node's header map; repeated headers are joined with ", "
 */
function convertHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

export function createUndiciTransport(options: UndiciTransportOptions): UndiciTransport {
  return new UndiciTransport(options);
}
