import { describe, it, expect } from 'vitest';
import { ArchiveConfigBuilder } from '../builder.js';
import { NoopLogger } from '../../observability/logging.js';
import { ArchiveErrorKind, isErrorKind } from '../../errors/error.js';

describe('ArchiveConfigBuilder', () => {
  it('should build a validated configuration', () => {
    const logger = new NoopLogger();
    const config = new ArchiveConfigBuilder()
      .credentials('AK', 'SK')
      .userAgent('my-uploader/1.0')
      .timeout(1000)
      .endpoints({ archive: 'http://localhost:8080' })
      .logging({ level: 'debug' })
      .logger(logger)
      .build();

    expect(config.credentials?.accessKey).toBe('AK');
    expect(config.userAgent).toBe('my-uploader/1.0');
    expect(config.timeout).toBe(1000);
    expect(config.endpoints.archive).toBe('http://localhost:8080');
    expect(config.logging).toEqual({ level: 'debug', format: 'pretty', includeTimestamps: true });
    expect(config.logger).toBe(logger);
  });

  it('should merge endpoint calls', () => {
    const config = new ArchiveConfigBuilder()
      .endpoints({ s3: 'http://localhost:1' })
      .endpoints({ catalog: 'http://localhost:2' })
      .build();
    expect(config.endpoints).toEqual({
      s3: 'http://localhost:1',
      archive: 'https://archive.org',
      catalog: 'http://localhost:2',
    });
  });

  it('should start from an existing config', () => {
    const config = ArchiveConfigBuilder.from({ userAgent: 'base/1.0' }).timeout(5).build();
    expect(config.userAgent).toBe('base/1.0');
    expect(config.timeout).toBe(5);
  });

  it('should reject empty credentials immediately', () => {
    let thrown: unknown;
    try {
      new ArchiveConfigBuilder().credentials('', 'SK');
    } catch (error) {
      thrown = error;
    }
    expect(isErrorKind(thrown, ArchiveErrorKind.MissingCredentials)).toBe(true);
  });
});
