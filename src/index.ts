// Client
export { MediaClient, DEFAULT_REGISTRY } from './client/media-client.js';
export type { MediaClientOptions, BuildOptions } from './client/media-client.js';

// Configuration and logging
export { resolveConfig, DEFAULT_CONTAINER_SIZE } from './config.js';
export type { ClientConfig, ResolvedConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Collaborator interfaces
export type {
  Transport,
  QueryOptions,
  QueryParams,
  ParamValue,
  HttpMethod,
  EditSink,
  EditTarget,
  EditFields,
  EditValue,
} from './types.js';
export { HttpTransport, TOKEN_HEADER } from './transport/http-transport.js';
export type { HttpTransportOptions } from './transport/http-transport.js';
export { SectionEditSink } from './edits/section-edit-sink.js';
export { searchType, SEARCH_TYPES } from './edits/search-types.js';

// Attribute trees
export { AttributeNode } from './tree/attribute-node.js';
export { parseXml } from './tree/xml.js';
export { toInt, toFloat, toBool, toDate } from './tree/casts.js';

// Query evaluation
export { matchesFilters, extractValues, TAG_ATTRIBUTE } from './query/evaluator.js';
export { parseFilterKey, compileFilters, PATH_DELIMITER } from './query/parser.js';
export { OPERATOR_NAMES } from './query/types.js';
export type { Filters, FilterOperand, OperatorName, QueryPredicate, ScalarOperand } from './query/types.js';

// Object model
export { MediaObject } from './objects/media-object.js';
export type { FieldValues } from './objects/media-object.js';
export { PartialObject } from './objects/partial-object.js';
export { SessionEntry } from './objects/session-entry.js';
export { HistoryEntry } from './objects/history-entry.js';
export { ResultContainer } from './objects/container.js';
export type { ContainerFields } from './objects/container.js';
export { CachedValue } from './objects/cached-value.js';
export {
  VariantRegistry,
  dispatchKey,
  SESSION_LISTING_PATH,
  HISTORY_LISTING_PATH,
} from './objects/registry.js';
export { CONTAINER_START_HEADER, CONTAINER_SIZE_HEADER } from './objects/pagination.js';
export type { FetchOptions, FetchPath } from './objects/pagination.js';
export type { FindOptions, ListAttrsOptions } from './objects/finder.js';
export type {
  TypedObject,
  Variant,
  ListingKind,
  PopulationMode,
  ReloadOptions,
  DetailParam,
} from './objects/types.js';

// Errors
export {
  UnknownVariantError,
  NotFoundError,
  UnsupportedError,
  BadRequestError,
  TransportError,
  XmlParseError,
} from './errors.js';
