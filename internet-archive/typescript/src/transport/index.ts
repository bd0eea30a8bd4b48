/**
 * HTTP transport layer
 * @module internet-archive-client/transport
 */

export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
export {
  getHeader,
  isSuccessResponse,
  getRequestId,
  getETag,
  decodeBody,
} from './types.js';
export { FetchTransport, createFetchTransport, type FetchTransportOptions } from './fetch-transport.js';
export { execute, buildQuery, encodePath, type RequestContext } from './execute.js';
export { decodeJson, parseJsonBody, validateJson } from './json.js';
