/**
 * Archive items
 * @module internet-archive-client/item
 */

export { Item, type ItemOptions } from './item.js';
export { uploadFile, normalizeFilePath, type UploadSettings } from './upload.js';
export { listFiles, listBucket } from './list.js';
export { downloadFile } from './download.js';
export { getMetadata } from './metadata.js';
export { fileEntrySchema, filesResponseSchema, metadataResponseSchema } from './schemas.js';
export type {
  MetadataValue,
  MetadataInput,
  UploadRequest,
  UploadResult,
  FileChecksums,
  FileEntry,
  BucketEntry,
  ItemMetadata,
} from './types.js';
