/**
 * Core XML parsing utilities for IAS3 responses
 * @module internet-archive-client/xml/parser
 */

import { XMLParser } from 'fast-xml-parser';
import { ArchiveError } from '../errors/error.js';

/**
 * Parser options for the S3-style XML the archive returns.
 *
 * Tag values stay strings; conversion is done by the callers' schemas.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Creates a configured XML parser instance
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Parses and validates an XML document.
 *
 * The result is untyped; callers narrow it with a schema.
 *
 * @throws {ArchiveError} `Request` kind with code `MalformedResponse` on invalid XML
 */
export function parseXml(xml: string): unknown {
  const parser = createXmlParser();
  try {
    const parsed: unknown = parser.parse(xml, true);
    return parsed;
  } catch (error) {
    throw ArchiveError.malformedResponse(
      `Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Normalizes array-or-single-item XML parsing behavior.
 * A repeated element parses to an array, a single one to an object.
 *
 * @example
 * ```typescript
 * normalizeArray(undefined); // []
 * normalizeArray('single'); // ['single']
 * normalizeArray(['a', 'b']); // ['a', 'b']
 * ```
 */
export function normalizeArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Removes surrounding quotes from ETag values
 */
export function cleanETag(eTag: string): string {
  return eTag.replace(/^"(.+)"$/, '$1');
}

/**
 * Safely parses an integer from a string
 */
export function parseIntSafe(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}
