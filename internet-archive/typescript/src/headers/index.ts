export {
  buildHeaders,
  renderHeader,
  metadataHeaders,
  metadataHeaderName,
  encodeMetadataValue,
  type Ias3Header,
} from './ias3.js';
