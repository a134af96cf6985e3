export { ShareLinkSource, type ShareLinkSourceOptions } from './core/share-link-source';

export {
  isValidShareLink,
  extractResourceId,
  parseShareLink,
  buildDownloadUrl,
  buildViewUrl,
  looksLikeShareLink,
  normalizeShareLink,
} from './utils/url';

export {
  FIELD_DELIMITER,
  VALUE_DELIMITER,
  splitLines,
  splitFields,
  decodeCell,
  parseRow,
  parseRows,
  parseRecords,
  zipRecord,
  parseDelimitedText,
} from './core/parser';

export { mapRows, cellAsList, cellAsText } from './core/row-mapper';

export {
  isAccessible,
  fetchAndStage,
  withStagedResource,
  type StagedResource,
  type FetchCollaborators,
} from './core/resource-fetcher';

export {
  createFetchTransport,
  type HttpTransport,
  type TransportResponse,
  type TransportBodyResponse,
  type FetchTransportOptions,
} from './core/transport';

export { createTempDirStore, decodeUtf8, type StagingStore } from './core/staging';

export {
  DEFAULT_TIMEOUT,
  setRequestTimeout,
  getRequestTimeout,
  setStagingDirectory,
  getStagingDirectory,
  setDebugLogging,
  isDebugLogging,
  resetConfig,
} from './core/config';

export {
  ShareLinkError,
  FormatError,
  TransportError,
  ParseError,
  TypeMismatchError,
  isShareLinkError,
  toShareLinkError,
  formatErrorForUser,
  formatErrorForLog,
  logError,
} from './core/errors';

export {
  ErrorType,
  type Cell,
  type Row,
  type DataRecord,
  type ResultShape,
  type ParseResult,
  type RowModel,
  type RecordModel,
  type ModelSpec,
  type ParsedShareLink,
} from './core/types';
