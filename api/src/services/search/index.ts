/**
 * Search sync service module.
 *
 * Re-exports all search service components.
 */

export { SearchTransport } from "./client";
export type { SearchTransportShape, UpdateOptions } from "./client";
export { OpenSearchTransport, OpenSearchTransportLive } from "./opensearch";
export { SyncCache, SyncCacheLive, computeCacheKey, makeMemorySyncCache } from "./cache";
export type { SyncCacheShape } from "./cache";
export { IndexMappings, IndexMappingsFromDefinitions, makeIndexMappings } from "./mappings";
export type { IndexDefinitions, IndexMappingsShape } from "./mappings";
export { SearchModels, SearchModelsLive, makeSearchModels } from "./models";
export type { SearchModel, SearchModelsShape } from "./models";
export { canonicalJson, encodeValue, isSerializable, toJsonObject, toJsonValue } from "./serialization";
export { buildDocument, buildUpdateDocument, cleanUpdateFields } from "./document";
export {
  asSearchAction,
  deleteDocument,
  fetchDocument,
  indexDocument,
  submitActions,
  updateDocument,
} from "./writer";
export {
  SearchQuery,
  SearchQueryRepository,
  executeSearch,
  extractSearchTerms,
  recordQuery,
} from "./query-log";
export type { ExecuteSearchInput, RecordQueryInput, SearchQueryRepositoryShape } from "./query-log";
export { MemoryRecordSource, fromSearchQuery, inSearchIndex } from "./ranking";
export type { RankedRecord, RecordSource } from "./ranking";
export {
  SqliteDatabase,
  SqliteDatabaseLive,
  SqliteRecordSource,
  SqliteSearchQueryRepository,
  SqliteSearchQueryRepositoryLive,
} from "./sqlite";
export { syncOnDelete, syncOnSave, updateIndex } from "./sync";
export type { IndexOutcome, SaveOptions } from "./sync";
export {
  InvalidArgument,
  InvalidDocument,
  InvalidState,
  InvalidUpdate,
  NotImplemented,
  StoreFailure,
  TransportFailure,
} from "./errors";
export type { SyncError } from "./errors";
export type {
  DocumentSource,
  EntityId,
  JsonObject,
  JsonValue,
  QueryType,
  SearchAction,
  SearchDocument,
  SearchHit,
  UpdateStrategy,
  WriteOutcome,
} from "./types";
