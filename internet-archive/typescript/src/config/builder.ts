/**
 * Fluent configuration builder
 * @module internet-archive-client/config/builder
 */

import { Credentials } from '../auth/credentials.js';
import type { LoggingConfig, Logger } from '../observability/logging.js';
import type { HttpTransport } from '../transport/types.js';
import type { ArchiveConfig, ArchiveEndpoints, NormalizedArchiveConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing client configuration.
 *
 * @example
 * ```typescript
 * const config = new ArchiveConfigBuilder()
 *   .credentials('AK', 'SK')
 *   .userAgent('my-uploader/1.0')
 *   .timeout(60000)
 *   .build();
 * ```
 */
export class ArchiveConfigBuilder {
  private config: ArchiveConfig = {};

  /**
   * Sets the IAS3 access and secret keys.
   */
  credentials(accessKey: string, secretKey: string): this {
    this.config.credentials = new Credentials(accessKey, secretKey);
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  endpoints(endpoints: Partial<ArchiveEndpoints>): this {
    this.config.endpoints = { ...this.config.endpoints, ...endpoints };
    return this;
  }

  logging(logging: Partial<LoggingConfig>): this {
    this.config.logging = { ...this.config.logging, ...logging };
    return this;
  }

  transport(transport: HttpTransport): this {
    this.config.transport = transport;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  fetch(fetchImpl: typeof fetch): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ArchiveError} If configuration is invalid
   */
  build(): NormalizedArchiveConfig {
    return normalizeConfig(this.config);
  }

  /**
   * Creates a builder from an existing config
   */
  static from(config: ArchiveConfig): ArchiveConfigBuilder {
    const builder = new ArchiveConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
