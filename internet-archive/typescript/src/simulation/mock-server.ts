/**
 * In-process archive double
 * @module internet-archive-client/simulation
 */

import { DEFAULT_ENDPOINTS } from '../config/defaults.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/types.js';
import { getHeader } from '../transport/types.js';
import type {
  CannedResponse,
  MockServerOptions,
  RecordedRequest,
  StoredFile,
  StoredItem,
  StoredTask,
} from './types.js';
import {
  errorXml,
  escapeXml,
  formatTaskTime,
  generateETag,
  generateRequestId,
  sha1Hex,
} from './utils.js';

const WAIT_ADMIN_STATUS: Record<string, StoredTask['status']> = {
  '0': 'queued',
  '1': 'running',
  '2': 'error',
  '9': 'paused',
};

const META_HEADER = /^x-archive-meta(\d{2})?-(.+)$/;

const encoder = new TextEncoder();

function decodeMetaValue(value: string): string {
  const match = /^uri\((.*)\)$/.exec(value);
  return match ? decodeURIComponent(match[1] ?? '') : value;
}

/**
 * HttpTransport that emulates the archive endpoints in memory.
 *
 * Handles IAS3 uploads and bucket listings, the metadata API, downloads,
 * task search and task logs. Every request is recorded.
 *
 * @example
 * ```typescript
 * const server = new MockArchiveServer();
 * const client = createClient({ transport: server, credentials: new Credentials('AK', 'SK') });
 *
 * await client.item('test-item').uploadFile({ path: 'a.txt', body: 'hi' });
 * server.requests[0].method; // 'PUT'
 * ```
 */
export class MockArchiveServer implements HttpTransport {
  readonly requests: RecordedRequest[] = [];

  private readonly items = new Map<string, StoredItem>();
  private readonly tasks: StoredTask[] = [];
  private readonly logs = new Map<number, string>();
  private readonly canned: CannedResponse[] = [];
  private readonly origins: { s3: string; archive: string; catalog: string };
  private readonly now: () => Date;
  private readonly accessKey?: string;
  private nextTaskId = 1;

  constructor(options: MockServerOptions = {}) {
    const endpoints = { ...DEFAULT_ENDPOINTS, ...options.endpoints };
    this.origins = {
      s3: new URL(endpoints.s3).origin,
      archive: new URL(endpoints.archive).origin,
      catalog: new URL(endpoints.catalog).origin,
    };
    this.now = options.now ?? (() => new Date());
    this.accessKey = options.accessKey;
  }

  /**
   * Adds an item with the given files.
   */
  addItem(
    identifier: string,
    files: Record<string, string | Uint8Array> = {},
    metadata: Record<string, string | string[]> = {}
  ): void {
    const item: StoredItem = { files: new Map(), metadata: { identifier, ...metadata }, created: this.now() };
    for (const [path, content] of Object.entries(files)) {
      item.files.set(path, this.storeFile(typeof content === 'string' ? encoder.encode(content) : content));
    }
    this.items.set(identifier, item);
  }

  getItem(identifier: string): StoredItem | undefined {
    return this.items.get(identifier);
  }

  /**
   * Adds a task and returns its id. Missing fields get plausible values.
   */
  addTask(task: Partial<StoredTask> & { identifier: string }): number {
    const taskId = task.task_id ?? this.nextTaskId;
    this.nextTaskId = Math.max(this.nextTaskId, taskId) + 1;
    this.tasks.push({
      cmd: 'archive.php',
      status: 'queued',
      priority: 0,
      submitter: 'tester@example.org',
      submittime: formatTaskTime(this.now()),
      args: {},
      ...task,
      task_id: taskId,
    });
    return taskId;
  }

  getTasks(): readonly StoredTask[] {
    return this.tasks;
  }

  setTaskLog(taskId: number, log: string): void {
    this.logs.set(taskId, log);
  }

  /**
   * Queues a response returned, in order, before any emulated one.
   */
  respondWith(response: CannedResponse): void {
    this.canned.push(response);
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push({
      method: request.method,
      url: request.url,
      headers: { ...request.headers },
      body: request.body,
      timestamp: Date.now(),
    });

    const canned = this.canned.shift();
    if (canned) {
      return this.respond(canned.status, canned.body ?? '', canned.headers);
    }

    const url = new URL(request.url);
    const segments = url.pathname
      .split('/')
      .filter((segment) => segment !== '')
      .map((segment) => decodeURIComponent(segment));

    if (url.origin === this.origins.s3) {
      return this.handleS3(request, segments);
    }
    if (url.origin === this.origins.archive) {
      return this.handleArchive(request, url, segments);
    }
    if (url.origin === this.origins.catalog) {
      return this.handleCatalog(request, url, segments);
    }
    return this.respond(404, 'Not Found');
  }

  private handleS3(request: HttpRequest, segments: string[]): HttpResponse {
    const [identifier, ...pathSegments] = segments;
    if (!identifier) {
      return this.respond(400, 'Bad Request');
    }

    if (request.method === 'PUT' && pathSegments.length > 0) {
      return this.handleUpload(request, identifier, pathSegments.join('/'));
    }
    if (request.method === 'GET' && pathSegments.length === 0) {
      return this.handleListBucket(identifier);
    }
    return this.respond(405, 'Method Not Allowed');
  }

  private handleUpload(request: HttpRequest, identifier: string, path: string): HttpResponse {
    const requestId = generateRequestId();
    const authorization = getHeader(request.headers, 'authorization');
    const match = authorization ? /^LOW ([^:]+):(.+)$/.exec(authorization) : null;
    const accessKey = match?.[1];

    if (!accessKey || (this.accessKey !== undefined && accessKey !== this.accessKey)) {
      return this.respond(
        403,
        errorXml('AccessDenied', 'Access Denied', requestId),
        { 'content-type': 'application/xml', 'x-amz-request-id': requestId }
      );
    }

    let item = this.items.get(identifier);
    if (!item) {
      if (getHeader(request.headers, 'x-amz-auto-make-bucket') !== '1') {
        return this.respond(
          404,
          errorXml('NoSuchBucket', 'The specified bucket does not exist.', requestId),
          { 'content-type': 'application/xml', 'x-amz-request-id': requestId }
        );
      }
      item = { files: new Map(), metadata: this.readMetadataHeaders(identifier, request.headers), created: this.now() };
      this.items.set(identifier, item);
    }

    const data = request.body ?? new Uint8Array();
    const previous = item.files.get(path);
    if (previous && getHeader(request.headers, 'x-archive-keep-old-version') === '1') {
      let version = 1;
      while (item.files.has(`history/files/${path}.~${version}~`)) {
        version++;
      }
      item.files.set(`history/files/${path}.~${version}~`, previous);
    }

    const stored = this.storeFile(data, getHeader(request.headers, 'content-type'));
    item.files.set(path, stored);

    this.addTask({ identifier, cmd: 'archive.php', submitter: accessKey, args: { file: path } });
    if (getHeader(request.headers, 'x-archive-queue-derive') !== '0') {
      this.addTask({ identifier, cmd: 'derive.php', submitter: accessKey });
    }

    return this.respond(200, '', { etag: stored.eTag, 'x-amz-request-id': requestId });
  }

  private readMetadataHeaders(
    identifier: string,
    headers: Record<string, string>
  ): Record<string, string | string[]> {
    const metadata: Record<string, string | string[]> = { identifier };
    const lists = new Map<string, Array<[number, string]>>();

    for (const [name, value] of Object.entries(headers)) {
      const match = META_HEADER.exec(name.toLowerCase());
      if (!match || !match[2]) {
        continue;
      }
      const field = match[2].replace(/--/g, '_');
      if (match[1] === undefined) {
        metadata[field] = decodeMetaValue(value);
      } else {
        const entries = lists.get(field) ?? [];
        entries.push([Number(match[1]), decodeMetaValue(value)]);
        lists.set(field, entries);
      }
    }

    for (const [field, entries] of lists) {
      metadata[field] = entries.sort((a, b) => a[0] - b[0]).map(([, value]) => value);
    }
    return metadata;
  }

  private handleListBucket(identifier: string): HttpResponse {
    const item = this.items.get(identifier);
    const requestId = generateRequestId();
    if (!item) {
      return this.respond(
        404,
        errorXml('NoSuchBucket', 'The specified bucket does not exist.', requestId),
        { 'content-type': 'application/xml', 'x-amz-request-id': requestId }
      );
    }

    const contents = [...item.files.entries()]
      .map(
        ([key, file]) =>
          '<Contents>' +
          `<Key>${escapeXml(key)}</Key>` +
          `<LastModified>${file.lastModified.toISOString()}</LastModified>` +
          `<ETag>${escapeXml(file.eTag)}</ETag>` +
          `<Size>${file.data.length}</Size>` +
          '<StorageClass>STANDARD</StorageClass>' +
          '</Contents>'
      )
      .join('');

    const xml =
      '<?xml version="1.0" encoding="UTF-8"?>' +
      '<ListBucketResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">' +
      `<Name>${escapeXml(identifier)}</Name><Prefix></Prefix><Marker></Marker>` +
      `<MaxKeys>1000</MaxKeys><IsTruncated>false</IsTruncated>${contents}` +
      '</ListBucketResult>';

    return this.respond(200, xml, { 'content-type': 'application/xml', 'x-amz-request-id': requestId });
  }

  private handleArchive(request: HttpRequest, url: URL, segments: string[]): HttpResponse {
    if (request.method !== 'GET') {
      return this.respond(405, 'Method Not Allowed');
    }

    const [root, identifier, ...rest] = segments;

    if (root === 'metadata' && identifier) {
      const item = this.items.get(identifier);
      if (rest.length === 1 && rest[0] === 'files') {
        return this.json(200, item ? { result: this.fileRecords(item) } : {});
      }
      if (rest.length === 0) {
        return this.json(200, item ? this.metadataRecord(identifier, item) : {});
      }
      return this.json(200, {});
    }

    if (root === 'download' && identifier && rest.length > 0) {
      const file = this.items.get(identifier)?.files.get(rest.join('/'));
      if (!file) {
        return this.respond(404, `Item ${identifier} has no file ${rest.join('/')}`);
      }
      return this.respond(200, file.data, {
        'content-type': file.contentType ?? 'application/octet-stream',
        etag: file.eTag,
      });
    }

    if (root === 'services' && identifier === 'tasks.php') {
      return this.handleTaskSearch(url.searchParams);
    }

    return this.respond(404, 'Not Found');
  }

  private fileRecords(item: StoredItem): Array<Record<string, string>> {
    return [...item.files.entries()].map(([name, file]) => ({
      name,
      source: 'original',
      mtime: String(Math.floor(file.lastModified.getTime() / 1000)),
      size: String(file.data.length),
      sha1: file.sha1,
      format: name.endsWith('.txt') ? 'Text' : 'Unknown',
    }));
  }

  private metadataRecord(identifier: string, item: StoredItem): Record<string, unknown> {
    const files = [...item.files.values()];
    const lastUpdated = files.reduce(
      (latest, file) => Math.max(latest, file.lastModified.getTime()),
      item.created.getTime()
    );
    const pending = this.tasks.some(
      (task) => task.identifier === identifier && (task.status === 'queued' || task.status === 'running')
    );

    return {
      created: Math.floor(this.now().getTime() / 1000),
      d1: 'ia800100.us.archive.org',
      d2: 'ia900100.us.archive.org',
      dir: `/1/items/${identifier}`,
      server: 'ia800100.us.archive.org',
      workable_servers: ['ia800100.us.archive.org', 'ia900100.us.archive.org'],
      metadata: item.metadata,
      files: this.fileRecords(item),
      files_count: files.length,
      item_size: files.reduce((total, file) => total + file.data.length, 0),
      item_last_updated: Math.floor(lastUpdated / 1000),
      uniq: 1,
      ...(pending ? { pending_tasks: true } : {}),
      ...(this.tasks.some((task) => task.identifier === identifier && task.status === 'error')
        ? { has_redrow: true }
        : {}),
    };
  }

  private handleTaskSearch(params: URLSearchParams): HttpResponse {
    const limitParam = params.get('limit');
    const limit = limitParam === null ? 50 : Number(limitParam);
    if (!Number.isInteger(limit) || limit < 0) {
      return this.json(200, { success: false, error: 'invalid limit' });
    }
    const offset = Number(params.get('cursor') ?? '0');

    const matching = this.tasks.filter((task) => this.matchesFilters(task, params));
    const catalog = params.get('catalog') === '1' ? matching.filter((task) => task.status !== 'finished') : [];
    const history = params.get('history') === '1' ? matching.filter((task) => task.status === 'finished') : [];
    const selected = [...catalog, ...history];
    const page = selected.slice(offset, offset + limit);
    const nextOffset = offset + limit;

    const value: Record<string, unknown> = {
      catalog: page.filter((task) => task.status !== 'finished').map(({ finished: _finished, ...task }) => task),
      history: page
        .filter((task) => task.status === 'finished')
        .map(({ status: _status, ...task }) => ({ ...task, finished: task.finished ?? 0 })),
    };
    if (params.get('summary') === '1') {
      value['summary'] = {
        queued: matching.filter((task) => task.status === 'queued').length,
        running: matching.filter((task) => task.status === 'running').length,
        error: matching.filter((task) => task.status === 'error').length,
        paused: matching.filter((task) => task.status === 'paused').length,
      };
    }
    if (limit > 0 && nextOffset < selected.length) {
      value['cursor'] = String(nextOffset);
    }

    return this.json(200, { success: true, value });
  }

  private matchesFilters(task: StoredTask, params: URLSearchParams): boolean {
    const equals = (name: string, actual: string | number | undefined): boolean => {
      const expected = params.get(name);
      return expected === null || expected === String(actual);
    };
    const time = (name: string, compare: (actual: string, bound: string) => boolean): boolean => {
      const bound = params.get(name);
      return bound === null || compare(task.submittime, bound);
    };

    const waitAdmin = params.get('wait_admin');
    if (waitAdmin !== null && WAIT_ADMIN_STATUS[waitAdmin] !== task.status) {
      return false;
    }

    return (
      equals('identifier', task.identifier) &&
      equals('task_id', task.task_id) &&
      equals('cmd', task.cmd) &&
      equals('server', task.server) &&
      equals('submitter', task.submitter) &&
      equals('priority', task.priority) &&
      time('submittime>', (actual, bound) => actual > bound) &&
      time('submittime<', (actual, bound) => actual < bound) &&
      time('submittime>=', (actual, bound) => actual >= bound) &&
      time('submittime<=', (actual, bound) => actual <= bound)
    );
  }

  private handleCatalog(request: HttpRequest, url: URL, segments: string[]): HttpResponse {
    if (request.method !== 'GET' || segments.join('/') !== 'services/tasks.php') {
      return this.respond(404, 'Not Found');
    }

    const taskId = Number(url.searchParams.get('task_log'));
    const log = this.logs.get(taskId);
    if (log === undefined) {
      return this.respond(404, 'Task log not found');
    }
    return this.respond(200, log, { 'content-type': 'text/plain; charset=utf-8' });
  }

  private storeFile(data: Uint8Array, contentType?: string): StoredFile {
    return {
      data,
      eTag: generateETag(data),
      sha1: sha1Hex(data),
      lastModified: this.now(),
      contentType,
    };
  }

  private json(status: number, value: unknown): HttpResponse {
    return this.respond(status, JSON.stringify(value), { 'content-type': 'application/json' });
  }

  private respond(status: number, body: string | Uint8Array, headers: Record<string, string> = {}): HttpResponse {
    const lowered: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      lowered[name.toLowerCase()] = value;
    }
    return {
      status,
      headers: lowered,
      body: typeof body === 'string' ? encoder.encode(body) : body,
    };
  }
}
