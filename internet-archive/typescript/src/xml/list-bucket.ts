/**
 * XML parsing for IAS3 bucket listings
 * @module internet-archive-client/xml/list-bucket
 */

import { z } from 'zod';
import type { BucketEntry } from '../item/types.js';
import { ArchiveError } from '../errors/error.js';
import { parseXml, normalizeArray, cleanETag, parseIntSafe } from './parser.js';

const contentsSchema = z.object({
  Key: z.string(),
  LastModified: z.string(),
  ETag: z.string().optional(),
  Size: z.string().optional(),
});

type ContentsXml = z.infer<typeof contentsSchema>;

const listBucketSchema = z.object({
  ListBucketResult: z.union([
    z.object({
      Name: z.string().optional(),
      IsTruncated: z.string().optional(),
      Contents: z.union([contentsSchema, z.array(contentsSchema)]).optional(),
    }),
    // <ListBucketResult/> parses to an empty string
    z.literal(''),
  ]),
});

function parseContents(contents: ContentsXml): BucketEntry {
  const lastModified = new Date(contents.LastModified);
  if (isNaN(lastModified.getTime())) {
    throw ArchiveError.malformedResponse(
      `Invalid LastModified for ${contents.Key}: ${contents.LastModified}`
    );
  }

  return {
    key: contents.Key,
    lastModified,
    size: parseIntSafe(contents.Size, 0),
    ...(contents.ETag ? { etag: cleanETag(contents.ETag) } : {}),
  };
}

/**
 * Parses an IAS3 `ListBucketResult` document into bucket entries, in
 * document order.
 *
 * @throws {ArchiveError} `Request` kind with code `MalformedResponse`
 *
 * @example
 * ```typescript
 * parseListBucketResponse(`
 *   <ListBucketResult>
 *     <Name>my-item</Name>
 *     <Contents>
 *       <Key>file.txt</Key>
 *       <LastModified>2024-01-15T10:30:00.000Z</LastModified>
 *       <Size>12</Size>
 *     </Contents>
 *   </ListBucketResult>
 * `);
 * // [{ key: 'file.txt', lastModified: Date, size: 12 }]
 * ```
 */
export function parseListBucketResponse(xml: string): BucketEntry[] {
  const result = listBucketSchema.safeParse(parseXml(xml));

  if (!result.success) {
    throw ArchiveError.malformedResponse(
      `Invalid ListBucketResult document: ${result.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }

  const listing = result.data.ListBucketResult;
  if (listing === '') {
    return [];
  }

  return normalizeArray(listing.Contents).map(parseContents);
}
