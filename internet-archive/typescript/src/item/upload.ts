/**
 * File upload through IAS3
 * @module internet-archive-client/item/upload
 */

import { ArchiveError } from '../errors/error.js';
import { buildHeaders, metadataHeaders, type Ias3Header } from '../headers/ias3.js';
import { encodePath, execute, type RequestContext } from '../transport/execute.js';
import { getETag, getRequestId } from '../transport/types.js';
import type { UploadRequest, UploadResult } from './types.js';

/**
 * Item-level settings that shape an upload.
 */
export interface UploadSettings {
  keepOldVersions: boolean;
  autoMakeBucket: boolean;
}

/**
 * Strips leading and trailing `/` from a destination path.
 */
export function normalizeFilePath(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}

function toBytes(body: Uint8Array | string): Uint8Array {
  return typeof body === 'string' ? new TextEncoder().encode(body) : body;
}

/**
 * Uploads one file to an item with `PUT {s3}/{identifier}/{path}`.
 *
 * Metadata only takes effect when the upload creates the item.
 *
 * @throws {ArchiveError} `MissingCredentials` before any request when the context has no credentials
 * @throws {ArchiveError} `Configuration` when the path is empty
 */
export async function uploadFile(
  context: RequestContext,
  identifier: string,
  settings: UploadSettings,
  request: UploadRequest
): Promise<UploadResult> {
  if (!context.credentials) {
    throw ArchiveError.missingCredentials('uploadFile');
  }

  const path = normalizeFilePath(request.path);
  if (path === '') {
    throw ArchiveError.configuration('Upload path must not be empty');
  }

  const body = toBytes(request.body);

  const ias3: Ias3Header[] = [
    { type: 'keepOldVersion', enabled: settings.keepOldVersions },
    { type: 'autoMakeBucket', enabled: request.autoCreateBucket ?? settings.autoMakeBucket },
    { type: 'queueDerive', enabled: request.queueDerive ?? true },
    { type: 'sizeHint', bytes: body.length },
    ...(request.metadata ? metadataHeaders(request.metadata) : []),
  ];

  const headers: Record<string, string> = {
    ...buildHeaders(ias3),
    'content-length': String(body.length),
  };
  if (request.contentType) {
    headers['content-type'] = request.contentType;
  }

  const response = await execute(
    context,
    'uploadFile',
    {
      method: 'PUT',
      url: `${context.endpoints.s3}/${identifier}/${encodePath(path)}`,
      headers,
      body,
    },
    `Item ${identifier}`
  );

  return {
    identifier,
    path,
    size: body.length,
    etag: getETag(response.headers),
    requestId: getRequestId(response.headers),
  };
}
