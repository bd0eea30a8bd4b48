/**
 * Fetch-based HTTP transport implementation
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { ArchiveError } from '../errors/error.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Custom fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Buffers every response body. HTTP error statuses are returned, not thrown;
 * only connection failures and timeouts reject.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.timeout = options.timeout;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const arrayBuffer = await response.arrayBuffer();

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: new Uint8Array(arrayBuffer),
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key.toLowerCase()] = value;
    });
    return result;
  }

  /**
   * Handles errors from fetch operations
   */
  private handleError(error: unknown, request: HttpRequest): ArchiveError {
    if (error instanceof ArchiveError) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return ArchiveError.timeout(this.timeout);
      }

      return ArchiveError.request(
        `${request.method} ${request.url} failed: ${error.message}`,
        error
      );
    }

    return ArchiveError.request(`${request.method} ${request.url} failed: ${String(error)}`);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 300000, fetchImpl?: typeof fetch): HttpTransport {
  return new FetchTransport({ timeout, fetch: fetchImpl });
}
