/**
 * File download
 * @module internet-archive-client/item/download
 */

import { ArchiveError } from '../errors/error.js';
import { encodePath, execute, type RequestContext } from '../transport/execute.js';
import { normalizeFilePath } from './upload.js';

/**
 * Downloads one file of an item and returns its bytes.
 *
 * @throws {ArchiveError} `NotFound` when the item or file does not exist
 * @throws {ArchiveError} `Configuration` when the path is empty
 */
export async function downloadFile(
  context: RequestContext,
  identifier: string,
  path: string
): Promise<Uint8Array> {
  const filePath = normalizeFilePath(path);
  if (filePath === '') {
    throw ArchiveError.configuration('Download path must not be empty');
  }

  const response = await execute(
    context,
    'downloadFile',
    {
      method: 'GET',
      url: `${context.endpoints.archive}/download/${identifier}/${encodePath(filePath)}`,
      headers: {},
    },
    `File ${identifier}/${filePath}`
  );

  return response.body;
}
