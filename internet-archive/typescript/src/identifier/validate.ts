/**
 * Item identifier rules
 * @module internet-archive-client/identifier/validate
 */

import { ArchiveError } from '../errors/error.js';

/** Longest identifier the archive accepts. */
export const MAX_IDENTIFIER_LENGTH = 100;

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Checks an item identifier.
 *
 * Valid identifiers are 1 to 100 ASCII characters, start with a letter or
 * digit, and otherwise contain only letters, digits, `_`, `-` and `.`.
 *
 * @example
 * ```typescript
 * validateIdentifier('my-item_2024.v1'); // true
 * validateIdentifier('_hidden');         // false
 * ```
 */
export function validateIdentifier(identifier: string): boolean {
  return identifier.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(identifier);
}

/**
 * @throws {ArchiveError} `InvalidIdentifier` when {@link validateIdentifier} fails
 */
export function assertIdentifier(identifier: string): void {
  if (!validateIdentifier(identifier)) {
    throw ArchiveError.invalidIdentifier(identifier);
  }
}
