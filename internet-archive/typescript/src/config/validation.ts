/**
 * Configuration validation and normalization
 * @module internet-archive-client/config/validation
 */

import { z } from 'zod';
import { ArchiveError } from '../errors/error.js';
import { createDefaultLoggingConfig } from '../observability/logging.js';
import type { ArchiveConfig, NormalizedArchiveConfig } from './types.js';
import { DEFAULT_ENDPOINTS, DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from './defaults.js';

const endpointSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith('http://') || value.startsWith('https://'), {
    message: 'must use http or https',
  });

/**
 * Zod schema for the plain-data part of the configuration.
 */
export const configSchema = z.object({
  userAgent: z.string().trim().min(1),
  timeout: z.number().int().positive(),
  endpoints: z.object({
    s3: endpointSchema,
    archive: endpointSchema,
    catalog: endpointSchema,
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']),
    format: z.enum(['pretty', 'json', 'compact']),
    includeTimestamps: z.boolean(),
  }),
});

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Applies defaults and validates the configuration.
 *
 * @throws {ArchiveError} `Configuration` kind listing every invalid field
 */
export function normalizeConfig(config: ArchiveConfig = {}): NormalizedArchiveConfig {
  const candidate = {
    userAgent: config.userAgent && config.userAgent.trim() !== '' ? config.userAgent : DEFAULT_USER_AGENT,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    endpoints: { ...DEFAULT_ENDPOINTS, ...config.endpoints },
    logging: { ...createDefaultLoggingConfig(), ...config.logging },
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    throw ArchiveError.configuration(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { endpoints } = result.data;

  return {
    credentials: config.credentials,
    userAgent: result.data.userAgent,
    timeout: result.data.timeout,
    endpoints: {
      s3: stripTrailingSlash(endpoints.s3),
      archive: stripTrailingSlash(endpoints.archive),
      catalog: stripTrailingSlash(endpoints.catalog),
    },
    logging: result.data.logging,
    transport: config.transport,
    logger: config.logger,
    fetch: config.fetch,
  };
}
