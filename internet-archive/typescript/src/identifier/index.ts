export { validateIdentifier, assertIdentifier, MAX_IDENTIFIER_LENGTH } from './validate.js';
