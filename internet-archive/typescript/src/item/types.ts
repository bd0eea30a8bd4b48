/**
 * Item request and response types
 * @module internet-archive-client/item/types
 */

/**
 * A single metadata value, or a list of values for repeatable fields such as
 * `subject`.
 */
export type MetadataValue = string | number | boolean | ReadonlyArray<string | number | boolean>;

/**
 * Item metadata given either as ordered `[name, value]` pairs or as a record.
 */
export type MetadataInput =
  | ReadonlyArray<readonly [string, MetadataValue]>
  | Readonly<Record<string, MetadataValue>>;

/**
 * Parameters for uploading one file to an item.
 */
export interface UploadRequest {
  /** Destination path inside the item, e.g. `docs/readme.txt`. */
  path: string;

  /** File contents. Strings are encoded as UTF-8. */
  body: Uint8Array | string;

  /**
   * Metadata for the item. Only applied when this upload creates the item;
   * the archive discards it for existing items.
   */
  metadata?: MetadataInput;

  /**
   * Create the item if it does not exist yet.
   * @default the item's `autoMakeBucket` setting (true)
   */
  autoCreateBucket?: boolean;

  /**
   * Queue a derive task after the upload.
   * @default true
   */
  queueDerive?: boolean;

  /** MIME type sent as `content-type`. */
  contentType?: string;
}

/**
 * Outcome of a successful upload.
 */
export interface UploadResult {
  identifier: string;
  path: string;
  /** Payload size in bytes. */
  size: number;
  etag?: string;
  requestId?: string;
}

/**
 * Checksums reported for a file by the metadata API.
 */
export interface FileChecksums {
  md5?: string;
  sha1?: string;
  crc32?: string;
}

/**
 * A file inside an item, as reported by the metadata API.
 */
export interface FileEntry {
  /** Path of the file inside the item. */
  name: string;
  /** Size in bytes; absent for some metadata-only files. */
  size?: number;
  checksums: FileChecksums;
  /** Format name, e.g. "Text", "JPEG", "Metadata". */
  format?: string;
  /** "original", "derivative" or "metadata". */
  source?: string;
  modifiedAt?: Date;
}

/**
 * A key in the IAS3 bucket listing.
 */
export interface BucketEntry {
  key: string;
  lastModified: Date;
  size: number;
  etag?: string;
}

/**
 * Item metadata record returned by the metadata API.
 */
export interface ItemMetadata {
  /** UNIX epoch seconds when this record was generated. */
  created: number;
  /** Primary data server. Do not build download URLs from it. */
  d1?: string;
  /** Secondary data server. */
  d2?: string;
  /** Absolute path of the item on the data servers. */
  dir?: string;
  /** Preferred server for reading the item. */
  server?: string;
  workableServers: string[];
  /** Item metadata fields; values are strings or lists of strings. */
  metadata: Record<string, unknown>;
  /** Total size in bytes of all files. */
  itemSize?: number;
  itemLastUpdated?: number;
  filesCount?: number;
  files: FileEntry[];
  isDark: boolean;
  noDownload: boolean;
  isCollection: boolean;
  pendingTasks: boolean;
  hasRedRow: boolean;
  serversUnavailable: boolean;
}
