/**
 * Request execution shared by every operation
 * @module internet-archive-client/transport/execute
 */

import type { Credentials } from '../auth/credentials.js';
import type { ArchiveEndpoints } from '../config/types.js';
import { mapResponseToError } from '../errors/mapping.js';
import type { Logger } from '../observability/logging.js';
import { logRequest, logResponse } from '../observability/logging.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { isSuccessResponse } from './types.js';

/**
 * Everything an operation needs to talk to the archive.
 */
export interface RequestContext {
  transport: HttpTransport;
  logger: Logger;
  endpoints: ArchiveEndpoints;
  userAgent: string;
  credentials?: Credentials;
}

/**
 * Encodes a path inside an item, keeping `/` separators.
 *
 * @example
 * ```typescript
 * encodePath('docs/my file.txt'); // 'docs/my%20file.txt'
 * ```
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * Builds a query string from ordered parameters, skipping undefined values.
 */
export function buildQuery(params: ReadonlyArray<readonly [string, string | number | undefined]>): string {
  const search = new URLSearchParams();
  for (const [name, value] of params) {
    if (value !== undefined) {
      search.append(name, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

/**
 * Sends a request and returns the 2xx response.
 *
 * Adds the user agent and, when the context carries credentials, the
 * authorization header.
 *
 * @param operation - Operation name used in log lines
 * @param resource - Human-readable target, used in NotFound messages
 * @throws {ArchiveError} Mapped from any non-2xx response, or from the transport
 */
export async function execute(
  context: RequestContext,
  operation: string,
  request: HttpRequest,
  resource: string
): Promise<HttpResponse> {
  const headers: Record<string, string> = {
    'user-agent': context.userAgent,
    ...request.headers,
  };
  if (context.credentials) {
    headers['authorization'] = context.credentials.authorizationHeader();
  }

  logRequest(context.logger, operation, request.method, request.url, request.body?.length);
  const startTime = Date.now();

  let response: HttpResponse;
  try {
    response = await context.transport.send({ ...request, headers });
  } catch (error) {
    context.logger.warn('Request failed', {
      operation,
      method: request.method,
      url: request.url,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  logResponse(context.logger, operation, response.status, Date.now() - startTime);

  if (!isSuccessResponse(response)) {
    const error = mapResponseToError(response, resource);
    context.logger.warn('Request returned an error status', {
      operation,
      status: response.status,
      kind: error.kind,
      requestId: error.requestId,
    });
    throw error;
  }

  return response;
}
