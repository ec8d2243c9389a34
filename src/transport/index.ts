/**
 * HTTP transport for direct uploads
 * @module dataverse-direct-upload/transport
 */

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './types.js';
export {
  getHeader,
  getETag,
  getRetryAfter,
  bodyText,
  extractErrorMessage,
  describeUrl,
} from './types.js';
export { UndiciTransport, createUndiciTransport, type UndiciTransportOptions } from './undici-transport.js';
