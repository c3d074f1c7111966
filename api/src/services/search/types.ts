/**
 * Search sync types.
 *
 * These types define the contract between indexable records, the search
 * engine and the query log.
 */

/**
 * Identifier of a record in the backing store and of its document in the index.
 */
export type EntityId = string | number;

/**
 * A value that survives `JSON.stringify` / `JSON.parse` unchanged.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A search document: field name to value, shaped for one index.
 *
 * Values must JSON-encode; the builder rejects any that do not.
 */
export type SearchDocument = Record<string, unknown>;

/**
 * How partial updates are sent to the engine.
 *
 * - FULL: always send the complete document
 * - PARTIAL: send only the requested (and eligible) fields
 */
export type UpdateStrategy = "FULL" | "PARTIAL";

/**
 * Classifier stored with each logged query.
 */
export type QueryType = "SEARCH" | "SUGGEST" | "ADMIN" | "ERROR";

export type SearchActionType = "index" | "update" | "delete";

/**
 * A bulk action record, in the shape the engine's bulk helpers take.
 */
export type SearchAction =
  | {
      _index: string;
      _op_type: "index";
      _id: EntityId | null;
      _source: SearchDocument;
    }
  | {
      _index: string;
      _op_type: "update";
      _id: EntityId | null;
      doc: SearchDocument;
    }
  | {
      _index: string;
      _op_type: "delete";
      _id: EntityId | null;
    };

/**
 * Anything that can appear in a search index.
 *
 * Entity types implement this explicitly; `asSearchDocument` is left out by
 * types that only take part in retrieval.
 *
 * @example
 * ```typescript
 * class Article implements DocumentSource {
 *   readonly entityType = "article";
 *   constructor(public id: number | null, public title: string) {}
 *   readField(field: string) {
 *     return field === "title" ? this.title : undefined;
 *   }
 *   asSearchDocument() {
 *     return { title: this.title };
 *   }
 * }
 * ```
 */
export interface DocumentSource {
  /** Stable name of the entity type, used in cache keys and index mappings. */
  readonly entityType: string;
  /** Null until the record has been saved. */
  readonly id: EntityId | null;
  /** Current value of a field, or undefined when the entity has no such field. */
  readField(field: string): unknown;
  /** The full document for the named index. */
  asSearchDocument?(index: string): SearchDocument;
}

/**
 * A single hit as returned by the engine, in relevance order.
 */
export interface SearchHit {
  id: EntityId;
  /** Null when the engine did not score the hit (e.g. sorted queries). */
  score: number | null;
  doc_type?: string;
  index?: string;
}

/**
 * One entry of the ordered id/score list fed to ranked retrieval.
 */
export interface HitRanking {
  readonly id: EntityId;
  /** Hit score, 0 when the engine returned none. */
  readonly score: number;
  /** 0-based position in the original hit order. */
  readonly rank: number;
}

/**
 * Raw search response, reduced to what the query log stores.
 */
export interface RawSearchResponse {
  /** The hits, ordered by relevance. */
  hits: SearchHit[];
  /** Total number of matching documents. */
  total: number;
  /** Time taken by the engine in milliseconds. */
  tookMs: number;
}

/**
 * A document as read back from the engine.
 */
export interface FetchedDocument {
  id: string;
  index: string;
  found: boolean;
  source: Record<string, unknown> | null;
}

/**
 * Summary of one bulk request.
 */
export interface BulkResult {
  items: number;
  tookMs: number;
}

/**
 * What a write operation did.
 *
 * `duplicate` and `empty` are the two no-op outcomes: the first means the
 * document matched the last one written, the second that nothing requested
 * was eligible for the index.
 */
export type WriteOutcome =
  | "indexed"
  | "updated"
  | "deleted"
  | "duplicate"
  | "empty";

/**
 * Type guard for JSON objects (as opposed to arrays and scalars).
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
