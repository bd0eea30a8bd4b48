/**
 * Type definitions for the in-process archive double
 * @module internet-archive-client/simulation
 */

import type { TaskStatus } from '../tasks/types.js';

/**
 * Request captured by the mock server
 */
export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Uint8Array;
  /** Timestamp when request was made */
  timestamp: number;
}

/**
 * A file held by the mock server
 */
export interface StoredFile {
  data: Uint8Array;
  eTag: string;
  sha1: string;
  lastModified: Date;
  contentType?: string;
}

/**
 * An item held by the mock server
 */
export interface StoredItem {
  files: Map<string, StoredFile>;
  metadata: Record<string, string | string[]>;
  created: Date;
}

/**
 * A task held by the mock server, in the tasks API's wire shape.
 */
export interface StoredTask {
  task_id: number;
  identifier: string;
  cmd: string;
  status: TaskStatus;
  priority: number;
  submitter: string;
  submittime: string;
  server?: string;
  args: Record<string, string>;
  finished?: number;
}

/**
 * A canned response returned instead of the emulated one
 */
export interface CannedResponse {
  status: number;
  body?: string | Uint8Array;
  headers?: Record<string, string>;
}

export interface MockServerOptions {
  /** Endpoints the server answers on; must match the client's. */
  endpoints?: {
    s3?: string;
    archive?: string;
    catalog?: string;
  };
  /** Clock used for timestamps. */
  now?: () => Date;
  /**
   * Only accept uploads signed with this access key, when set.
   */
  accessKey?: string;
}
