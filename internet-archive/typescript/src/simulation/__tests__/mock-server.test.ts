import { describe, it, expect, beforeEach } from 'vitest';
import { MockArchiveServer } from '../mock-server.js';
import { errorXml, escapeXml, formatTaskTime, generateETag, generateRequestId, sha1Hex } from '../utils.js';
import { decodeBody } from '../../transport/types.js';

const encoder = new TextEncoder();
const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('simulation utils', () => {
  it('should derive ETags from SHA-256', () => {
    expect(generateETag(encoder.encode('abc'))).toBe('"ba7816bf8f01cfea414140de5dae2223"');
  });

  it('should hash SHA-1', () => {
    expect(sha1Hex(encoder.encode('abc'))).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
  });

  it('should generate uppercase hex request ids', () => {
    expect(generateRequestId()).toMatch(/^[0-9A-F]{16}$/);
  });

  it('should format task times', () => {
    expect(formatTaskTime(NOW)).toBe('2024-03-01 12:00:00');
  });

  it('should escape XML text', () => {
    expect(escapeXml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&apos;');
    expect(errorXml('NoSuchKey', 'gone', 'REQ1')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>' +
        '<Error><Code>NoSuchKey</Code><Message>gone</Message><RequestId>REQ1</RequestId></Error>'
    );
  });
});

describe('MockArchiveServer', () => {
  let server: MockArchiveServer;

  beforeEach(() => {
    server = new MockArchiveServer({ now: () => NOW });
  });

  it('should record requests and return canned responses first', async () => {
    server.respondWith({ status: 503, body: 'busy' });

    const first = await server.send({ method: 'GET', url: 'https://archive.org/metadata/test-item', headers: {} });
    const second = await server.send({ method: 'GET', url: 'https://archive.org/metadata/test-item', headers: {} });

    expect(first.status).toBe(503);
    expect(decodeBody(first)).toBe('busy');
    expect(second.status).toBe(200);
    expect(decodeBody(second)).toBe('{}');
    expect(server.requests.map((request) => request.url)).toEqual([
      'https://archive.org/metadata/test-item',
      'https://archive.org/metadata/test-item',
    ]);
  });

  it('should answer 404 for unknown hosts', async () => {
    const response = await server.send({ method: 'GET', url: 'https://example.org/', headers: {} });

    expect(response.status).toBe(404);
  });

  it('should serve files of added items', async () => {
    server.addItem('test-item', { 'docs/a.txt': 'hello' }, { title: 'Test' });

    const response = await server.send({
      method: 'GET',
      url: 'https://archive.org/download/test-item/docs/a.txt',
      headers: {},
    });

    expect(response.status).toBe(200);
    expect(decodeBody(response)).toBe('hello');
    expect(server.getItem('test-item')?.metadata).toEqual({ identifier: 'test-item', title: 'Test' });
  });

  it('should create items from metadata headers', async () => {
    const response = await server.send({
      method: 'PUT',
      url: 'https://s3.us.archive.org/new-item/a.txt',
      headers: {
        authorization: 'LOW AK:SK',
        'x-amz-auto-make-bucket': '1',
        'x-archive-meta-title': 'uri(Caf%C3%A9)',
        'x-archive-meta01-subject': 'second',
        'x-archive-meta00-subject': 'first',
        'x-archive-meta-page--count': '3',
      },
      body: encoder.encode('a'),
    });

    expect(response.status).toBe(200);
    expect(server.getItem('new-item')?.metadata).toEqual({
      identifier: 'new-item',
      title: 'Café',
      subject: ['first', 'second'],
      page_count: '3',
    });
    expect(server.getTasks().map((task) => task.cmd)).toEqual(['archive.php', 'derive.php']);
  });

  it('should keep task ids increasing past explicit ids', () => {
    expect(server.addTask({ identifier: 'a', task_id: 10 })).toBe(10);
    expect(server.addTask({ identifier: 'b' })).toBe(11);
  });

  it('should report an invalid limit as an unsuccessful search', async () => {
    const response = await server.send({
      method: 'GET',
      url: 'https://archive.org/services/tasks.php?catalog=1&limit=abc',
      headers: {},
    });

    expect(JSON.parse(decodeBody(response))).toEqual({ success: false, error: 'invalid limit' });
  });
});
