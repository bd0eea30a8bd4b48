export {
  ArchiveError,
  ArchiveErrorKind,
  isArchiveError,
  isErrorKind,
  type ArchiveErrorOptions,
} from './error.js';
export { mapResponseToError, extractServerError, type ServerErrorInfo } from './mapping.js';
export { ok, err, settle, attempt, type Result } from './result.js';
