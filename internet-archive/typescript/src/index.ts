/**
 * Internet Archive client
 *
 * Uploads, listings, downloads and item metadata through IAS3 and the
 * metadata API, plus catalog task search and logs.
 *
 * @example
 * ```typescript
 * import { createClientFromEnv } from 'internet-archive-client';
 *
 * const client = createClientFromEnv();
 * const item = client.item('my-test-item');
 *
 * await item.uploadFile({ path: 'docs/hello.txt', body: 'Hello World!', metadata: { collection: 'test_collection' } });
 * const files = await item.list();
 * const tasks = await client.tasks.search({ identifier: 'my-test-item' });
 * ```
 *
 * @module internet-archive-client
 */

export { VERSION } from './version.js';

// Client
export { ArchiveClient, createClient, createClientFromEnv } from './client/index.js';

// Configuration
export {
  ArchiveConfigBuilder,
  createConfigFromEnv,
  normalizeConfig,
  configSchema,
  ENV_VARS,
  DEFAULT_S3_ENDPOINT,
  DEFAULT_ARCHIVE_ENDPOINT,
  DEFAULT_CATALOG_ENDPOINT,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  DEFAULT_ENDPOINTS,
  type ArchiveConfig,
  type ArchiveEndpoints,
  type NormalizedArchiveConfig,
} from './config/index.js';

// Credentials
export { Credentials, SecretString, ACCESS_KEY_ENV, SECRET_KEY_ENV } from './auth/index.js';

// Errors
export {
  ArchiveError,
  ArchiveErrorKind,
  isArchiveError,
  isErrorKind,
  mapResponseToError,
  extractServerError,
  ok,
  err,
  settle,
  attempt,
  type ArchiveErrorOptions,
  type ServerErrorInfo,
  type Result,
} from './errors/index.js';

// Identifiers
export { validateIdentifier, assertIdentifier, MAX_IDENTIFIER_LENGTH } from './identifier/index.js';

// IAS3 headers
export {
  buildHeaders,
  renderHeader,
  metadataHeaders,
  metadataHeaderName,
  encodeMetadataValue,
  type Ias3Header,
} from './headers/index.js';

// Items
export {
  Item,
  type ItemOptions,
  type MetadataValue,
  type MetadataInput,
  type UploadRequest,
  type UploadResult,
  type FileChecksums,
  type FileEntry,
  type BucketEntry,
  type ItemMetadata,
} from './item/index.js';

// Tasks
export {
  TasksService,
  searchTasks,
  searchTasksPage,
  iterateTasks,
  getTaskLog,
  ACTIVE_TASK_STATUSES,
  TASK_COMMANDS,
  taskStatusToWaitAdmin,
  taskStatusColor,
  isKnownTaskCommand,
  type ActiveTaskStatus,
  type TaskStatus,
  type KnownTaskCommand,
  type TaskCommand,
  type TaskCategories,
  type TaskSearchCriteria,
  type Task,
  type TaskSummary,
  type TaskPage,
} from './tasks/index.js';

// Logging
export {
  ConsoleLogger,
  NoopLogger,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
} from './observability/index.js';

// Transport
export {
  FetchTransport,
  createFetchTransport,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type FetchTransportOptions,
  type RequestContext,
} from './transport/index.js';
