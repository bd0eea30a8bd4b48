/**
 * XML parsing for IAS3 error responses
 * @module internet-archive-client/xml/error
 */

import { z } from 'zod';
import { parseXml } from './parser.js';

const errorDocumentSchema = z.object({
  Error: z.object({
    Code: z.string(),
    Message: z.string().optional(),
    RequestId: z.string().optional(),
    Resource: z.string().optional(),
  }),
});

/**
 * Parsed error information from an IAS3 response
 */
export interface ParsedError {
  /** Error code (e.g. 'NoSuchKey', 'AccessDenied') */
  readonly code: string;
  readonly message?: string;
  readonly requestId?: string;
  readonly resource?: string;
}

/**
 * Parses an S3-style `<Error>` document.
 *
 * Returns `undefined` when the text is not such a document, so callers can
 * fall back to other body formats.
 *
 * @example
 * ```typescript
 * parseErrorResponse('<Error><Code>NoSuchKey</Code><Message>Not found</Message></Error>');
 * // { code: 'NoSuchKey', message: 'Not found', requestId: undefined, resource: undefined }
 * ```
 */
export function parseErrorResponse(xml: string): ParsedError | undefined {
  if (!xml.includes('<Error>')) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = parseXml(xml);
  } catch {
    return undefined;
  }

  const result = errorDocumentSchema.safeParse(parsed);
  if (!result.success) {
    return undefined;
  }

  const error = result.data.Error;
  return {
    code: error.Code,
    message: error.Message,
    requestId: error.RequestId,
    resource: error.Resource,
  };
}
