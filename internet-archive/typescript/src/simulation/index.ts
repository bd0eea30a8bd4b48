/**
 * Simulation support for tests
 * @module internet-archive-client/simulation
 */

export { MockArchiveServer } from './mock-server.js';
export type {
  RecordedRequest,
  StoredFile,
  StoredItem,
  StoredTask,
  CannedResponse,
  MockServerOptions,
} from './types.js';
export { generateETag, generateRequestId, formatTaskTime } from './utils.js';
