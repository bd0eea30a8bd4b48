/**
 * Factory functions for creating clients
 * @module internet-archive-client/client
 */

import { ArchiveClient } from './client.js';
import type { ArchiveConfig, NormalizedArchiveConfig } from '../config/types.js';
import { normalizeConfig } from '../config/validation.js';
import { createConfigFromEnv } from '../config/env.js';
import { ConsoleLogger } from '../observability/logging.js';
import { createFetchTransport } from '../transport/fetch-transport.js';

function buildClient(config: NormalizedArchiveConfig): ArchiveClient {
  const transport = config.transport ?? createFetchTransport(config.timeout, config.fetch);
  const logger = config.logger ?? new ConsoleLogger(config.logging);
  return new ArchiveClient(config, transport, logger);
}

/**
 * Creates a client from a configuration object.
 *
 * @throws {ArchiveError} `Configuration` if the configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   credentials: new Credentials('AK', 'SK'),
 *   userAgent: 'my-uploader/1.0',
 * });
 *
 * await client.item('my-test-item').uploadFile({ path: 'hello.txt', body: 'Hello' });
 * ```
 */
export function createClient(config: ArchiveConfig = {}): ArchiveClient {
  return buildClient(normalizeConfig(config));
}

/**
 * Creates a client from environment variables.
 *
 * Reads `AWS_ACCESS_KEY_ID` and `AWS_SECRET_ACCESS_KEY` for credentials and
 * the `IA_*` variables listed in {@link createConfigFromEnv}.
 *
 * @throws {ArchiveError} `Configuration` if a variable is invalid
 */
export function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ArchiveConfig = {}
): ArchiveClient {
  return buildClient(createConfigFromEnv(env, overrides));
}
