/**
 * Item file listings
 * @module internet-archive-client/item/list
 */

import { execute, type RequestContext } from '../transport/execute.js';
import { decodeJson } from '../transport/json.js';
import { decodeBody } from '../transport/types.js';
import { parseListBucketResponse } from '../xml/list-bucket.js';
import { filesResponseSchema } from './schemas.js';
import type { BucketEntry, FileEntry } from './types.js';

/**
 * Lists the files of an item through the metadata API.
 *
 * Entries come back in server order. An unknown item lists as empty.
 */
export async function listFiles(context: RequestContext, identifier: string): Promise<FileEntry[]> {
  const response = await execute(
    context,
    'list',
    {
      method: 'GET',
      url: `${context.endpoints.archive}/metadata/${identifier}/files`,
      headers: { accept: 'application/json' },
    },
    `Item ${identifier}`
  );

  const body = decodeJson(response, filesResponseSchema, 'file listing');
  return body.result ?? [];
}

/**
 * Lists the keys of an item's IAS3 bucket (`GET {s3}/{identifier}`).
 */
export async function listBucket(context: RequestContext, identifier: string): Promise<BucketEntry[]> {
  const response = await execute(
    context,
    'listBucket',
    {
      method: 'GET',
      url: `${context.endpoints.s3}/${identifier}`,
      headers: {},
    },
    `Bucket ${identifier}`
  );

  return parseListBucketResponse(decodeBody(response));
}
