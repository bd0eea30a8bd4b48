/**
 * Environment variable configuration loading
 * @module internet-archive-client/config/env
 */

import { Credentials } from '../auth/credentials.js';
import { ArchiveError } from '../errors/error.js';
import { LOG_LEVELS, type LogLevel } from '../observability/logging.js';
import type { ArchiveConfig, NormalizedArchiveConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names read by {@link createConfigFromEnv}.
 */
export const ENV_VARS = {
  USER_AGENT: 'IA_USER_AGENT',
  TIMEOUT_MS: 'IA_TIMEOUT_MS',
  LOG_LEVEL: 'IA_LOG_LEVEL',
  S3_ENDPOINT: 'IA_S3_ENDPOINT',
  ARCHIVE_ENDPOINT: 'IA_ARCHIVE_ENDPOINT',
  CATALOG_ENDPOINT: 'IA_CATALOG_ENDPOINT',
} as const;

/**
 * Parses an integer from an environment variable.
 *
 * @throws {ArchiveError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  if (!/^\d+$/.test(value.trim())) {
    throw ArchiveError.configuration(`${name} must be a valid integer, got: ${value}`);
  }

  return Number.parseInt(value, 10);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw ArchiveError.configuration(
      `${ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got: ${value}`
    );
  }
  return level;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Creates configuration from environment variables.
 *
 * Environment variables (all optional):
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY: IAS3 credentials
 * - IA_USER_AGENT: User-Agent header
 * - IA_TIMEOUT_MS: request timeout in milliseconds
 * - IA_LOG_LEVEL: trace, debug, info, warn, error or off
 * - IA_S3_ENDPOINT, IA_ARCHIVE_ENDPOINT, IA_CATALOG_ENDPOINT: endpoint overrides
 *
 * @param env - Environment to read, `process.env` by default
 * @param overrides - Values that take precedence over the environment
 * @throws {ArchiveError} If a variable is invalid
 */
export function createConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ArchiveConfig = {}
): NormalizedArchiveConfig {
  const endpoints = {
    ...(nonEmpty(env[ENV_VARS.S3_ENDPOINT]) ? { s3: nonEmpty(env[ENV_VARS.S3_ENDPOINT]) } : {}),
    ...(nonEmpty(env[ENV_VARS.ARCHIVE_ENDPOINT]) ? { archive: nonEmpty(env[ENV_VARS.ARCHIVE_ENDPOINT]) } : {}),
    ...(nonEmpty(env[ENV_VARS.CATALOG_ENDPOINT]) ? { catalog: nonEmpty(env[ENV_VARS.CATALOG_ENDPOINT]) } : {}),
  };
  const level = parseLogLevel(env[ENV_VARS.LOG_LEVEL]);

  return normalizeConfig({
    credentials: Credentials.fromEnv(env),
    userAgent: nonEmpty(env[ENV_VARS.USER_AGENT]),
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    ...overrides,
    endpoints: { ...endpoints, ...overrides.endpoints },
    logging: { ...(level ? { level } : {}), ...overrides.logging },
  });
}
