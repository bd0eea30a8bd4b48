/**
 * Schemas for metadata API responses
 * @module internet-archive-client/item/schemas
 */

import { z } from 'zod';
import type { FileEntry, ItemMetadata } from './types.js';

/** The metadata API sends most numbers as strings. */
const numeric = z.union([z.string(), z.number()]);

function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined || typeof value === 'number') {
    return value;
  }
  const trimmed = value.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

export const fileEntrySchema = z
  .object({
    name: z.string(),
    size: numeric.optional(),
    md5: z.string().optional(),
    sha1: z.string().optional(),
    crc32: z.string().optional(),
    mtime: numeric.optional(),
    format: z.string().optional(),
    source: z.string().optional(),
  })
  .transform((raw): FileEntry => {
    const mtime = toNumber(raw.mtime);
    return {
      name: raw.name,
      size: toNumber(raw.size),
      checksums: {
        ...(raw.md5 ? { md5: raw.md5 } : {}),
        ...(raw.sha1 ? { sha1: raw.sha1 } : {}),
        ...(raw.crc32 ? { crc32: raw.crc32 } : {}),
      },
      format: raw.format,
      source: raw.source,
      modifiedAt: mtime === undefined ? undefined : new Date(mtime * 1000),
    };
  });

/**
 * `GET /metadata/{identifier}/files`. Unknown items answer `{}`.
 */
export const filesResponseSchema = z.object({
  result: z.array(fileEntrySchema).optional(),
});

/**
 * `GET /metadata/{identifier}`.
 */
export const metadataResponseSchema = z
  .object({
    created: z.number(),
    d1: z.string().optional(),
    d2: z.string().optional(),
    dir: z.string().optional(),
    server: z.string().optional(),
    workable_servers: z.array(z.string()).default([]),
    metadata: z.record(z.unknown()).default({}),
    item_size: numeric.optional(),
    item_last_updated: numeric.optional(),
    files_count: numeric.optional(),
    files: z.array(fileEntrySchema).default([]),
    is_dark: z.boolean().default(false),
    nodownload: z.boolean().default(false),
    is_collection: z.boolean().default(false),
    pending_tasks: z.boolean().default(false),
    has_redrow: z.boolean().default(false),
    servers_unavailable: z.boolean().default(false),
  })
  .transform((raw): ItemMetadata => ({
    created: raw.created,
    d1: raw.d1,
    d2: raw.d2,
    dir: raw.dir,
    server: raw.server,
    workableServers: raw.workable_servers,
    metadata: raw.metadata,
    itemSize: toNumber(raw.item_size),
    itemLastUpdated: toNumber(raw.item_last_updated),
    filesCount: toNumber(raw.files_count),
    files: raw.files,
    isDark: raw.is_dark,
    noDownload: raw.nodownload,
    isCollection: raw.is_collection,
    pendingTasks: raw.pending_tasks,
    hasRedRow: raw.has_redrow,
    serversUnavailable: raw.servers_unavailable,
  }));
