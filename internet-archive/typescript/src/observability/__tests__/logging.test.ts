import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, NoopLogger, logRequest, redactContext } from '../logging.js';

describe('redactContext', () => {
  it('should redact credential-bearing keys at any depth', () => {
    expect(
      redactContext({
        url: 'https://s3.us.archive.org/item/a.txt',
        headers: { authorization: 'LOW AK:test-secret', 'user-agent': 'ua' },
        secretKey: 'test-secret',
      })
    ).toEqual({
      url: 'https://s3.us.archive.org/item/a.txt',
      headers: { authorization: '[REDACTED]', 'user-agent': 'ua' },
      secretKey: '[REDACTED]',
    });
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should filter below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'warn' });

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should log nothing when off', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'off' });

    logger.error('hidden');

    expect(error).not.toHaveBeenCalled();
    expect(logger.isEnabled('error')).toBe(false);
  });

  it('should format compact lines', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'info', format: 'compact' });

    logger.info('Uploaded', { path: 'a.txt' });

    expect(log).toHaveBeenCalledWith('[INFO] Uploaded {"path":"a.txt"}');
  });

  it('should format json lines with redaction', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'error', format: 'json', includeTimestamps: false });

    logger.error('Failed', { authorization: 'LOW AK:test-secret' });

    expect(error).toHaveBeenCalledWith('{"level":"error","message":"Failed","authorization":"[REDACTED]"}');
  });
});

describe('logRequest', () => {
  it('should log at debug with the request fields', () => {
    const logger = new NoopLogger();
    const debug = vi.spyOn(logger, 'debug');

    logRequest(logger, 'uploadFile', 'PUT', 'https://s3.us.archive.org/item/a.txt', 5);

    expect(debug).toHaveBeenCalledWith('Outgoing request', {
      operation: 'uploadFile',
      method: 'PUT',
      url: 'https://s3.us.archive.org/item/a.txt',
      bodyBytes: 5,
    });
  });
});
