import { describe, it, expect, vi } from 'vitest';
import { FetchTransport } from '../fetch-transport.js';
import { ArchiveError, ArchiveErrorKind } from '../../errors/error.js';

describe('FetchTransport', () => {
  it('should buffer the body and lowercase header names', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('hello', { status: 200, headers: { 'X-Amz-Request-Id': 'REQ1' } })
    );
    const transport = new FetchTransport({ timeout: 1000, fetch: fetchMock });

    const response = await transport.send({
      method: 'GET',
      url: 'https://archive.org/download/item/a.txt',
      headers: { 'user-agent': 'test' },
    });

    expect(response.status).toBe(200);
    expect(response.headers['x-amz-request-id']).toBe('REQ1');
    expect(new TextDecoder().decode(response.body)).toBe('hello');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://archive.org/download/item/a.txt',
      expect.objectContaining({ method: 'GET', headers: { 'user-agent': 'test' } })
    );
  });

  it('should return error statuses instead of throwing', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('gone', { status: 404 }));
    const transport = new FetchTransport({ timeout: 1000, fetch: fetchMock });

    const response = await transport.send({ method: 'GET', url: 'https://archive.org/x', headers: {} });

    expect(response.status).toBe(404);
  });

  it('should wrap network failures as request errors', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const transport = new FetchTransport({ timeout: 1000, fetch: fetchMock });

    const promise = transport.send({ method: 'GET', url: 'https://archive.org/x', headers: {} });

    await expect(promise).rejects.toBeInstanceOf(ArchiveError);
    await expect(promise).rejects.toMatchObject({
      kind: ArchiveErrorKind.Request,
      message: 'GET https://archive.org/x failed: fetch failed',
    });
  });

  it('should map aborts to timeouts', async () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(abort);
    const transport = new FetchTransport({ timeout: 250, fetch: fetchMock });

    await expect(
      transport.send({ method: 'GET', url: 'https://archive.org/x', headers: {} })
    ).rejects.toMatchObject({ kind: ArchiveErrorKind.Request, code: 'Timeout' });
  });
});
