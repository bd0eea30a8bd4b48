/**
 * Default configuration values
 * @module internet-archive-client/config/defaults
 */

import { VERSION } from '../version.js';
import type { ArchiveEndpoints } from './types.js';

/** Default IAS3 endpoint. */
export const DEFAULT_S3_ENDPOINT = 'https://s3.us.archive.org';

/** Default main site endpoint. */
export const DEFAULT_ARCHIVE_ENDPOINT = 'https://archive.org';

/** Default catalog server endpoint (task logs). */
export const DEFAULT_CATALOG_ENDPOINT = 'https://catalogd.archive.org';

/** Default request timeout in milliseconds (5 minutes). */
export const DEFAULT_TIMEOUT = 300000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = `internet-archive-client/${VERSION}`;

export const DEFAULT_ENDPOINTS: ArchiveEndpoints = {
  s3: DEFAULT_S3_ENDPOINT,
  archive: DEFAULT_ARCHIVE_ENDPOINT,
  catalog: DEFAULT_CATALOG_ENDPOINT,
};
