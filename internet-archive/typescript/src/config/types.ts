/**
 * Configuration type definitions
 * @module internet-archive-client/config/types
 */

import type { Credentials } from '../auth/credentials.js';
import type { LoggingConfig, Logger } from '../observability/logging.js';
import type { HttpTransport } from '../transport/types.js';

/**
 * Base URLs of the archive services.
 */
export interface ArchiveEndpoints {
  /** IAS3 endpoint, used for uploads and bucket listings. */
  s3: string;
  /** Main site, used for metadata, downloads and task search. */
  archive: string;
  /** Catalog server, used for task logs. */
  catalog: string;
}

/**
 * Client configuration as supplied by the caller.
 */
export interface ArchiveConfig {
  /** Credentials sent with every request that accepts them. */
  credentials?: Credentials;

  /**
   * User-Agent header value.
   * @default 'internet-archive-client/<version>'
   */
  userAgent?: string;

  /**
   * Request timeout in milliseconds.
   * @default 300000 (5 minutes)
   */
  timeout?: number;

  /** Endpoint overrides, e.g. for a local test double. */
  endpoints?: Partial<ArchiveEndpoints>;

  /** Logging configuration for the default console logger. */
  logging?: Partial<LoggingConfig>;

  /** Custom transport; replaces the fetch transport entirely. */
  transport?: HttpTransport;

  /** Custom logger; replaces the console logger. */
  logger?: Logger;

  /** Custom fetch implementation for the default transport. */
  fetch?: typeof fetch;
}

/**
 * Configuration with defaults applied and values validated.
 */
export interface NormalizedArchiveConfig {
  credentials?: Credentials;
  userAgent: string;
  timeout: number;
  endpoints: ArchiveEndpoints;
  logging: LoggingConfig;
  transport?: HttpTransport;
  logger?: Logger;
  fetch?: typeof fetch;
}
