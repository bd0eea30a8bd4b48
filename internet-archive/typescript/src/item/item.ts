/**
 * Item handle
 * @module internet-archive-client/item/item
 */

import type { Credentials } from '../auth/credentials.js';
import { DEFAULT_ENDPOINTS, DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../config/defaults.js';
import type { ArchiveEndpoints } from '../config/types.js';
import { assertIdentifier } from '../identifier/validate.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import type { RequestContext } from '../transport/execute.js';
import { FetchTransport } from '../transport/fetch-transport.js';
import type { HttpTransport } from '../transport/types.js';
import { downloadFile } from './download.js';
import { listBucket, listFiles } from './list.js';
import { getMetadata } from './metadata.js';
import type { BucketEntry, FileEntry, ItemMetadata, UploadRequest, UploadResult } from './types.js';
import { uploadFile } from './upload.js';

/**
 * Options accepted by {@link Item}.
 */
export interface ItemOptions {
  credentials?: Credentials;
  /** Empty or undefined selects the default user agent. */
  userAgent?: string;
  /**
   * Keep the previous version of overwritten files under `history/files/`.
   * @default false
   */
  keepOldVersions?: boolean;
  /**
   * Create the item on first upload if it does not exist.
   * @default true
   */
  autoMakeBucket?: boolean;
  transport?: HttpTransport;
  logger?: Logger;
  endpoints?: Partial<ArchiveEndpoints>;
  /** Timeout for the default transport, in milliseconds. */
  timeout?: number;
}

/**
 * A reference to one archive item.
 *
 * Items are immutable: every `with*` method returns a new Item and leaves
 * the original untouched.
 *
 * @example
 * ```typescript
 * const item = new Item('my-test-item')
 *   .withCredentials(new Credentials('AK', 'SK'))
 *   .withKeepOldVersions(true);
 *
 * await item.uploadFile({ path: 'hello.txt', body: 'Hello World!' });
 * const files = await item.list();
 * ```
 */
export class Item {
  readonly identifier: string;
  readonly userAgent: string;
  readonly keepOldVersions: boolean;
  readonly autoMakeBucket: boolean;
  private readonly options: ItemOptions;
  private readonly context: RequestContext;

  /**
   * @throws {ArchiveError} `InvalidIdentifier` when the identifier is not valid
   */
  constructor(identifier: string, options: ItemOptions = {}) {
    assertIdentifier(identifier);

    const transport = options.transport ?? new FetchTransport({ timeout: options.timeout ?? DEFAULT_TIMEOUT });
    const logger = options.logger ?? new ConsoleLogger();

    this.identifier = identifier;
    this.userAgent = options.userAgent ? options.userAgent : DEFAULT_USER_AGENT;
    this.keepOldVersions = options.keepOldVersions ?? false;
    this.autoMakeBucket = options.autoMakeBucket ?? true;
    this.options = { ...options, transport, logger };
    this.context = {
      transport,
      logger,
      endpoints: { ...DEFAULT_ENDPOINTS, ...options.endpoints },
      userAgent: this.userAgent,
      credentials: options.credentials,
    };
  }

  get credentials(): Credentials | undefined {
    return this.options.credentials;
  }

  get hasCredentials(): boolean {
    return this.options.credentials !== undefined;
  }

  /**
   * Returns a copy using the given credentials, or none when `undefined`.
   */
  withCredentials(credentials: Credentials | undefined): Item {
    return this.derive({ credentials });
  }

  withUserAgent(userAgent: string | undefined): Item {
    return this.derive({ userAgent });
  }

  withKeepOldVersions(keepOldVersions: boolean): Item {
    return this.derive({ keepOldVersions });
  }

  withAutoMake(autoMakeBucket: boolean): Item {
    return this.derive({ autoMakeBucket });
  }

  /**
   * Uploads one file. Needs credentials.
   *
   * The file may not be visible on the archive until the tasks queued by
   * the upload have run.
   */
  uploadFile(request: UploadRequest): Promise<UploadResult> {
    return uploadFile(
      this.context,
      this.identifier,
      { keepOldVersions: this.keepOldVersions, autoMakeBucket: this.autoMakeBucket },
      request
    );
  }

  /**
   * Lists the item's files through the metadata API.
   */
  list(): Promise<FileEntry[]> {
    return listFiles(this.context, this.identifier);
  }

  /**
   * Lists the item's IAS3 bucket.
   */
  listBucket(): Promise<BucketEntry[]> {
    return listBucket(this.context, this.identifier);
  }

  downloadFile(path: string): Promise<Uint8Array> {
    return downloadFile(this.context, this.identifier, path);
  }

  metadata(): Promise<ItemMetadata> {
    return getMetadata(this.context, this.identifier);
  }

  toString(): string {
    return `Item(${this.identifier})`;
  }

  private derive(changes: Partial<ItemOptions>): Item {
    return new Item(this.identifier, { ...this.options, ...changes });
  }
}
