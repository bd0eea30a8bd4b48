/**
 * Mapping of HTTP error responses to ArchiveError
 * @module internet-archive-client/errors/mapping
 */

import { z } from 'zod';
import { ArchiveError } from './error.js';
import type { HttpResponse } from '../transport/types.js';
import { decodeBody, getRequestId } from '../transport/types.js';
import { parseErrorResponse } from '../xml/error.js';

const MAX_TEXT_MESSAGE_LENGTH = 500;

const jsonErrorSchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
  message: z.string().optional(),
});

/**
 * Server-provided error information extracted from a response body.
 */
export interface ServerErrorInfo {
  code?: string;
  message?: string;
  requestId?: string;
}

function fromJson(body: string): ServerErrorInfo | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  const result = jsonErrorSchema.safeParse(parsed);
  if (!result.success) {
    return undefined;
  }

  const { error, message } = result.data;
  if (typeof error === 'string') {
    return { message: error };
  }
  return { message: error?.message ?? message };
}

/**
 * Extracts the server's error message from a response body.
 *
 * Understands S3 `<Error>` documents, JSON `{ "error": ... }` documents and
 * short plain-text bodies. HTML error pages yield no message.
 */
export function extractServerError(body: string): ServerErrorInfo {
  const trimmed = body.trim();
  if (trimmed === '') {
    return {};
  }

  if (trimmed.startsWith('<')) {
    const xmlError = parseErrorResponse(trimmed);
    if (xmlError) {
      return {
        code: xmlError.code,
        message: xmlError.message ?? xmlError.code,
        requestId: xmlError.requestId,
      };
    }
    return {};
  }

  if (trimmed.startsWith('{')) {
    return fromJson(trimmed) ?? {};
  }

  return {
    message: trimmed.length > MAX_TEXT_MESSAGE_LENGTH
      ? `${trimmed.slice(0, MAX_TEXT_MESSAGE_LENGTH)}...`
      : trimmed,
  };
}

/**
 * Maps a non-success response to an ArchiveError.
 *
 * @param response - The non-2xx response
 * @param resource - What was requested, used in NotFound messages
 */
export function mapResponseToError(response: HttpResponse, resource: string): ArchiveError {
  const info = extractServerError(decodeBody(response));
  const requestId = info.requestId ?? getRequestId(response.headers);

  if (response.status === 404) {
    return ArchiveError.notFound(
      info.message ? `${resource} not found: ${info.message}` : `${resource} not found`,
      requestId
    );
  }

  const code = info.code ?? (response.status === 403 ? 'Forbidden' : undefined);
  const message = info.message ?? `HTTP ${response.status} for ${resource}`;

  return ArchiveError.api(message, response.status, code, requestId);
}
