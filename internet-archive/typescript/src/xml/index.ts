/**
 * XML utilities for IAS3 responses
 * @module internet-archive-client/xml
 */

export { createXmlParser, parseXml, normalizeArray, cleanETag, parseIntSafe } from './parser.js';
export { parseErrorResponse, type ParsedError } from './error.js';
export { parseListBucketResponse } from './list-bucket.js';
