/**
 * IAS3 request headers
 * @module internet-archive-client/headers/ias3
 */

import type { Credentials } from '../auth/credentials.js';
import { ArchiveError } from '../errors/error.js';
import type { MetadataInput, MetadataValue } from '../item/types.js';

/**
 * One header understood by the IAS3 endpoint.
 */
export type Ias3Header =
  | { type: 'authorization'; credentials: Credentials }
  | { type: 'autoMakeBucket'; enabled: boolean }
  | { type: 'queueDerive'; enabled: boolean }
  | { type: 'keepOldVersion'; enabled: boolean }
  | { type: 'sizeHint'; bytes: number }
  | { type: 'ignorePreexistingBucket'; enabled: boolean }
  | { type: 'cascadeDelete'; enabled: boolean }
  | { type: 'metadata'; name: string; value: MetadataValue };

const METADATA_NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

function flag(enabled: boolean): string {
  return enabled ? '1' : '0';
}

/**
 * Converts a metadata field name to its header form.
 *
 * @throws {ArchiveError} `Configuration` when the name is not a valid field name
 */
export function metadataHeaderName(name: string): string {
  const lowered = name.toLowerCase();
  if (!METADATA_NAME_PATTERN.test(lowered)) {
    throw ArchiveError.configuration(`Invalid metadata field name: ${JSON.stringify(name)}`);
  }
  return lowered.replace(/_/g, '--');
}

/**
 * Encodes a metadata value for a header. Values outside printable ASCII
 * are wrapped as `uri(<percent-encoded>)`.
 */
export function encodeMetadataValue(value: string | number | boolean): string {
  const text = String(value);
  return PRINTABLE_ASCII.test(text) ? text : `uri(${encodeURIComponent(text)})`;
}

/**
 * Renders one IAS3 header as `[name, value]` wire pairs.
 *
 * A metadata list expands to one numbered header per value.
 */
export function renderHeader(header: Ias3Header): Array<[string, string]> {
  switch (header.type) {
    case 'authorization':
      return [['authorization', header.credentials.authorizationHeader()]];
    case 'autoMakeBucket':
      return [['x-amz-auto-make-bucket', flag(header.enabled)]];
    case 'queueDerive':
      return [['x-archive-queue-derive', flag(header.enabled)]];
    case 'keepOldVersion':
      return [['x-archive-keep-old-version', flag(header.enabled)]];
    case 'sizeHint':
      return [['x-archive-size-hint', String(header.bytes)]];
    case 'ignorePreexistingBucket':
      return [['x-archive-ignore-preexisting-bucket', flag(header.enabled)]];
    case 'cascadeDelete':
      return [['x-archive-cascade-delete', flag(header.enabled)]];
    case 'metadata': {
      const name = metadataHeaderName(header.name);
      const { value } = header;
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return [[`x-archive-meta-${name}`, encodeMetadataValue(value)]];
      }
      return value.map((entry, index): [string, string] => [
        `x-archive-meta${String(index).padStart(2, '0')}-${name}`,
        encodeMetadataValue(entry),
      ]);
    }
  }
}

/**
 * Renders a list of IAS3 headers into a header map. Later headers with the
 * same wire name replace earlier ones.
 */
export function buildHeaders(headers: readonly Ias3Header[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const header of headers) {
    for (const [name, value] of renderHeader(header)) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Turns metadata given as pairs or as a record into metadata headers,
 * keeping the caller's order.
 */
export function metadataHeaders(metadata: MetadataInput): Ias3Header[] {
  const entries: ReadonlyArray<readonly [string, MetadataValue]> = isPairList(metadata)
    ? metadata
    : Object.entries(metadata);
  return entries.map(([name, value]): Ias3Header => ({ type: 'metadata', name, value }));
}

function isPairList(
  metadata: MetadataInput
): metadata is ReadonlyArray<readonly [string, MetadataValue]> {
  return Array.isArray(metadata);
}
