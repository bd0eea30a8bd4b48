import { describe, it, expect } from 'vitest';
import { createConfigFromEnv } from '../env.js';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../defaults.js';
import { ArchiveErrorKind, isErrorKind } from '../../errors/error.js';

describe('createConfigFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    const config = createConfigFromEnv({});
    expect(config.credentials).toBeUndefined();
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
    expect(config.timeout).toBe(DEFAULT_TIMEOUT);
  });

  it('should read credentials and settings', () => {
    const config = createConfigFromEnv({
      AWS_ACCESS_KEY_ID: 'AK',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      IA_USER_AGENT: 'my-uploader/1.0',
      IA_TIMEOUT_MS: '60000',
      IA_LOG_LEVEL: 'DEBUG',
      IA_S3_ENDPOINT: 'http://localhost:9000',
      IA_CATALOG_ENDPOINT: 'http://localhost:9001/',
    });

    expect(config.credentials?.authorizationHeader()).toBe('LOW AK:test-secret');
    expect(config.userAgent).toBe('my-uploader/1.0');
    expect(config.timeout).toBe(60000);
    expect(config.logging.level).toBe('debug');
    expect(config.endpoints).toEqual({
      s3: 'http://localhost:9000',
      archive: 'https://archive.org',
      catalog: 'http://localhost:9001',
    });
  });

  it('should let overrides win over the environment', () => {
    const config = createConfigFromEnv(
      { IA_USER_AGENT: 'from-env', IA_S3_ENDPOINT: 'http://localhost:9000' },
      { userAgent: 'from-code', endpoints: { s3: 'http://localhost:9999' } }
    );
    expect(config.userAgent).toBe('from-code');
    expect(config.endpoints.s3).toBe('http://localhost:9999');
  });

  it('should reject a non-integer timeout', () => {
    let thrown: unknown;
    try {
      createConfigFromEnv({ IA_TIMEOUT_MS: '5s' });
    } catch (error) {
      thrown = error;
    }
    expect(isErrorKind(thrown, ArchiveErrorKind.Configuration)).toBe(true);
  });

  it('should reject an unknown log level', () => {
    expect(() => createConfigFromEnv({ IA_LOG_LEVEL: 'verbose' })).toThrow(
      'IA_LOG_LEVEL must be one of trace, debug, info, warn, error, off, got: verbose'
    );
  });
});
