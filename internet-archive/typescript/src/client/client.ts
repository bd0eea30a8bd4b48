/**
 * Main client implementation
 * @module internet-archive-client/client
 */

import type { Credentials } from '../auth/credentials.js';
import type { NormalizedArchiveConfig } from '../config/types.js';
import { Item } from '../item/item.js';
import type { Logger } from '../observability/logging.js';
import { TasksService } from '../tasks/service.js';
import type { HttpTransport } from '../transport/types.js';

/**
 * Entry point to the archive APIs.
 *
 * One client shares a configuration, transport and logger between the
 * items it hands out and its task service. Clients are immutable;
 * {@link ArchiveClient.withCredentials} returns a new one.
 */
export class ArchiveClient {
  /**
   * Task search and logs.
   */
  readonly tasks: TasksService;

  private readonly config: NormalizedArchiveConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: NormalizedArchiveConfig, transport: HttpTransport, logger: Logger) {
    this.config = config;
    this.transport = transport;
    this.logger = logger;

    this.tasks = new TasksService({
      transport,
      logger,
      endpoints: config.endpoints,
      userAgent: config.userAgent,
      credentials: config.credentials,
    });
  }

  get credentials(): Credentials | undefined {
    return this.config.credentials;
  }

  /**
   * Returns a handle to an item, carrying this client's credentials.
   *
   * @throws {ArchiveError} `InvalidIdentifier` when the identifier is not valid
   */
  item(identifier: string): Item {
    return new Item(identifier, {
      credentials: this.config.credentials,
      userAgent: this.config.userAgent,
      transport: this.transport,
      logger: this.logger,
      endpoints: this.config.endpoints,
      timeout: this.config.timeout,
    });
  }

  /**
   * Returns a client that uses other credentials, or none.
   */
  withCredentials(credentials: Credentials | undefined): ArchiveClient {
    return new ArchiveClient({ ...this.config, credentials }, this.transport, this.logger);
  }

  /**
   * Gets the normalized configuration
   * @internal
   */
  getConfig(): NormalizedArchiveConfig {
    return this.config;
  }
}
