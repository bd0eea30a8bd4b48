/**
 * Utility functions for simulation support
 * @module internet-archive-client/simulation
 */

import { sha1 } from '@noble/hashes/sha1';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

/**
 * Generate an ETag for file data
 *
 * SHA-256 of the data cut to MD5 length, quoted.
 */
export function generateETag(data: Uint8Array): string {
  return `"${bytesToHex(sha256(data)).substring(0, 32)}"`;
}

export function sha1Hex(data: Uint8Array): string {
  return bytesToHex(sha1(data));
}

/**
 * Generate a random request ID
 */
export function generateRequestId(): string {
  return Array.from({ length: 16 }, () => Math.floor(Math.random() * 16).toString(16))
    .join('')
    .toUpperCase();
}

/**
 * Formats a date the way the tasks API does: `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTaskTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Escapes text for an XML element body
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Builds an S3-style error document
 */
export function errorXml(code: string, message: string, requestId: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Error><Code>${escapeXml(code)}</Code><Message>${escapeXml(message)}</Message>` +
    `<RequestId>${requestId}</RequestId></Error>`
  );
}
