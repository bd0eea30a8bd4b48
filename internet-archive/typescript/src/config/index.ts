/**
 * Client configuration
 * @module internet-archive-client/config
 */

export type { ArchiveConfig, ArchiveEndpoints, NormalizedArchiveConfig } from './types.js';
export {
  DEFAULT_S3_ENDPOINT,
  DEFAULT_ARCHIVE_ENDPOINT,
  DEFAULT_CATALOG_ENDPOINT,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  DEFAULT_ENDPOINTS,
} from './defaults.js';
export { configSchema, normalizeConfig } from './validation.js';
export { ArchiveConfigBuilder } from './builder.js';
export { createConfigFromEnv, ENV_VARS } from './env.js';
