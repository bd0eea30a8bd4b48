/**
 * JSON response decoding
 * @module internet-archive-client/transport/json
 */

import type { z } from 'zod';
import { ArchiveError } from '../errors/error.js';
import type { HttpResponse } from './types.js';
import { decodeBody } from './types.js';

/**
 * Parses a response body as JSON without validating its shape.
 *
 * @throws {ArchiveError} `Request` kind with code `MalformedResponse` on invalid JSON
 */
export function parseJsonBody(response: HttpResponse, description: string): unknown {
  try {
    const parsed: unknown = JSON.parse(decodeBody(response));
    return parsed;
  } catch (error) {
    throw ArchiveError.malformedResponse(
      `Invalid JSON in ${description}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Validates an already-parsed JSON value against a schema.
 *
 * @throws {ArchiveError} `Request` kind with code `MalformedResponse` when the value does not match
 */
export function validateJson<T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  description: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw ArchiveError.malformedResponse(`Unexpected ${description}: ${issues}`);
  }
  return result.data;
}

/**
 * Parses and validates a JSON response body.
 */
export function decodeJson<T>(
  response: HttpResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  description: string
): T {
  return validateJson(parseJsonBody(response, description), schema, description);
}
