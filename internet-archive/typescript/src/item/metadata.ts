/**
 * Item metadata retrieval
 * @module internet-archive-client/item/metadata
 */

import { ArchiveError } from '../errors/error.js';
import { execute, type RequestContext } from '../transport/execute.js';
import { parseJsonBody, validateJson } from '../transport/json.js';
import { getRequestId } from '../transport/types.js';
import { metadataResponseSchema } from './schemas.js';
import type { ItemMetadata } from './types.js';

function isEmptyObject(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 0
  );
}

/**
 * Reads the metadata record of an item.
 *
 * @throws {ArchiveError} `NotFound` when the API answers `{}` for an unknown item
 */
export async function getMetadata(context: RequestContext, identifier: string): Promise<ItemMetadata> {
  const response = await execute(
    context,
    'metadata',
    {
      method: 'GET',
      url: `${context.endpoints.archive}/metadata/${identifier}`,
      headers: { accept: 'application/json' },
    },
    `Item ${identifier}`
  );

  const parsed = parseJsonBody(response, 'metadata record');
  if (isEmptyObject(parsed)) {
    throw ArchiveError.notFound(`Item ${identifier} not found`, getRequestId(response.headers));
  }

  return validateJson(parsed, metadataResponseSchema, 'metadata record');
}
