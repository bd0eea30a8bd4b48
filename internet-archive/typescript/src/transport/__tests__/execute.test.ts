import { describe, it, expect, vi, type Mock } from 'vitest';
import { buildQuery, encodePath, execute, type RequestContext } from '../execute.js';
import type { HttpResponse, HttpTransport } from '../types.js';
import { DEFAULT_ENDPOINTS } from '../../config/defaults.js';
import { NoopLogger } from '../../observability/logging.js';
import { Credentials } from '../../auth/credentials.js';
import { ArchiveError, ArchiveErrorKind } from '../../errors/error.js';

function context(response: HttpResponse | Error, credentials?: Credentials): {
  context: RequestContext;
  send: Mock<HttpTransport['send']>;
  logger: NoopLogger;
} {
  const send = vi.fn<HttpTransport['send']>();
  if (response instanceof Error) {
    send.mockRejectedValue(response);
  } else {
    send.mockResolvedValue(response);
  }
  const logger = new NoopLogger();
  return {
    context: { transport: { send }, logger, endpoints: DEFAULT_ENDPOINTS, userAgent: 'test-agent/1.0', credentials },
    send,
    logger,
  };
}

const ok: HttpResponse = { status: 200, headers: {}, body: new Uint8Array() };

describe('encodePath', () => {
  it('should encode segments and keep separators', () => {
    expect(encodePath('docs/my file.txt')).toBe('docs/my%20file.txt');
    expect(encodePath('a#b/c?d')).toBe('a%23b/c%3Fd');
  });
});

describe('buildQuery', () => {
  it('should skip undefined values and keep order', () => {
    expect(buildQuery([['a', '1'], ['b', undefined], ['c', 2]])).toBe('?a=1&c=2');
  });

  it('should return an empty string when nothing is set', () => {
    expect(buildQuery([['a', undefined]])).toBe('');
  });
});

describe('execute', () => {
  it('should add the user agent and authorization', async () => {
    const { context: ctx, send } = context(ok, new Credentials('AK', 'SK'));

    await execute(ctx, 'test', { method: 'GET', url: 'https://archive.org/x', headers: { accept: 'text/plain' } }, 'X');

    expect(send).toHaveBeenCalledWith({
      method: 'GET',
      url: 'https://archive.org/x',
      headers: { 'user-agent': 'test-agent/1.0', accept: 'text/plain', authorization: 'LOW AK:SK' },
    });
  });

  it('should not send authorization without credentials', async () => {
    const { context: ctx, send } = context(ok);

    await execute(ctx, 'test', { method: 'GET', url: 'https://archive.org/x', headers: {} }, 'X');

    expect(send.mock.calls[0]?.[0].headers).toEqual({ 'user-agent': 'test-agent/1.0' });
  });

  it('should throw mapped errors and log a warning for error statuses', async () => {
    const { context: ctx, logger } = context({ status: 404, headers: {}, body: new Uint8Array() });
    const warn = vi.spyOn(logger, 'warn');

    await expect(
      execute(ctx, 'downloadFile', { method: 'GET', url: 'https://archive.org/download/i/a', headers: {} }, 'File i/a')
    ).rejects.toMatchObject({ kind: ArchiveErrorKind.NotFound, message: 'File i/a not found' });
    expect(warn).toHaveBeenCalledWith('Request returned an error status', {
      operation: 'downloadFile',
      status: 404,
      kind: ArchiveErrorKind.NotFound,
      requestId: undefined,
    });
  });

  it('should rethrow transport failures', async () => {
    const failure = ArchiveError.request('connection refused');
    const { context: ctx } = context(failure);

    await expect(
      execute(ctx, 'test', { method: 'GET', url: 'https://archive.org/x', headers: {} }, 'X')
    ).rejects.toBe(failure);
  });
});
