/**
 * Search query log.
 *
 * Every executed query is kept as an immutable SearchQuery record: the raw
 * body, the ordered hits, paging and timing. Records are append-only.
 */

import { Clock, Context, Effect } from "effect";
import type { Option } from "effect";
import { SearchTransport } from "./client";
import type { StoreFailure } from "./errors";
import { toJsonObject, toJsonValue } from "./serialization";
import { isJsonObject } from "./types";
import type {
  EntityId,
  HitRanking,
  JsonObject,
  JsonValue,
  QueryType,
} from "./types";

/** Page size the engine uses when the body gives none. */
const DEFAULT_PAGE_SIZE = 10;

/** Text query clauses whose `query` string is taken as the search terms. */
const TEXT_QUERY_CLAUSES = [
  "multi_match",
  "query_string",
  "simple_query_string",
  "match",
  "match_phrase",
  "match_phrase_prefix",
  "match_bool_prefix",
];

export interface SearchQueryInit {
  id?: number | null;
  index?: string;
  user?: string | null;
  query?: JsonObject;
  hits?: ReadonlyArray<JsonValue>;
  totalHits?: number;
  reference?: string;
  queryType?: QueryType;
  /** Derived from `query` when left out. */
  searchTerms?: string;
  executedAt?: Date;
  /** Seconds. */
  duration?: number;
}

/**
 * Pull the search terms out of a raw query body.
 *
 * Reads the first text clause directly under `query`, in either its
 * `{ clause: { query } }` or field-keyed form. Anything else yields "".
 */
export function extractSearchTerms(query: JsonObject): string {
  const clauses = query["query"];
  if (!isJsonObject(clauses)) {
    return "";
  }
  for (const name of TEXT_QUERY_CLAUSES) {
    const clause = clauses[name];
    if (!isJsonObject(clause)) {
      continue;
    }
    const direct = clause["query"];
    if (typeof direct === "string") {
      return direct;
    }
    for (const value of Object.values(clause)) {
      if (typeof value === "string") {
        return value;
      }
      if (isJsonObject(value)) {
        const nested = value["query"];
        if (typeof nested === "string") {
          return nested;
        }
      }
    }
  }
  return "";
}

const hitField = (hit: JsonValue, field: string): JsonValue | undefined =>
  isJsonObject(hit) ? hit[field] : undefined;

const hitScore = (hit: JsonValue): number => {
  const score = hitField(hit, "score");
  return typeof score === "number" ? score : 0;
};

const hitId = (hit: JsonValue): EntityId | null => {
  const id = hitField(hit, "id");
  return typeof id === "string" || typeof id === "number" ? id : null;
};

/**
 * One executed query.
 */
export class SearchQuery {
  /** Null until the record has been saved. */
  readonly id: number | null;
  readonly index: string;
  readonly user: string | null;
  readonly query: JsonObject;
  /** Hits in the engine's relevance order. */
  readonly hits: ReadonlyArray<JsonValue>;
  readonly totalHits: number;
  readonly reference: string;
  readonly queryType: QueryType;
  readonly searchTerms: string;
  readonly executedAt: Date;
  /** Seconds. */
  readonly duration: number;

  constructor(init: SearchQueryInit = {}) {
    this.id = init.id ?? null;
    this.index = init.index ?? "";
    this.user = init.user ?? null;
    this.query = init.query ?? {};
    this.hits = init.hits ?? [];
    this.totalHits = init.totalHits ?? 0;
    this.reference = init.reference ?? "";
    this.queryType = init.queryType ?? "SEARCH";
    this.searchTerms = init.searchTerms ?? extractSearchTerms(this.query);
    this.executedAt = init.executedAt ?? new Date(0);
    this.duration = init.duration ?? 0;
  }

  /** Copy of this record with the id the store assigned. */
  withId(id: number): SearchQuery {
    return new SearchQuery({
      id,
      index: this.index,
      user: this.user,
      query: this.query,
      hits: this.hits,
      totalHits: this.totalHits,
      reference: this.reference,
      queryType: this.queryType,
      searchTerms: this.searchTerms,
      executedAt: this.executedAt,
      duration: this.duration,
    });
  }

  /** Ids of all hits. */
  get objectIds(): Set<EntityId> {
    const ids = new Set<EntityId>();
    for (const hit of this.hits) {
      const id = hitId(hit);
      if (id !== null) {
        ids.add(id);
      }
    }
    return ids;
  }

  /**
   * The `[from, size]` requested by the query body, or null for an empty
   * body.
   */
  get pageSlice(): readonly [number, number] | null {
    if (Object.keys(this.query).length === 0) {
      return null;
    }
    const from = this.query["from"];
    const size = this.query["size"];
    return [
      typeof from === "number" ? from : 0,
      typeof size === "number" ? size : DEFAULT_PAGE_SIZE,
    ];
  }

  /** Number of hits on this page: the requested size, capped by the hits returned. */
  get pageSize(): number {
    if (this.hits.length === 0) {
      return 0;
    }
    const size = this.pageSlice?.[1] ?? DEFAULT_PAGE_SIZE;
    return Math.min(size, this.hits.length);
  }

  /** 1-based position of the first hit on this page. */
  get pageFrom(): number {
    if (this.hits.length === 0) {
      return 0;
    }
    return (this.pageSlice?.[0] ?? 0) + 1;
  }

  /** 1-based position of the last hit on this page. */
  get pageTo(): number {
    if (this.hits.length === 0) {
      return 0;
    }
    return (this.pageSlice?.[0] ?? 0) + this.pageSize;
  }

  get maxScore(): number {
    return this.hits.length === 0 ? 0 : Math.max(...this.hits.map(hitScore));
  }

  get minScore(): number {
    return this.hits.length === 0 ? 0 : Math.min(...this.hits.map(hitScore));
  }

  /**
   * Hit ids with their score and position, in hit order. A repeated id
   * keeps its first position.
   */
  get ranking(): ReadonlyArray<HitRanking> {
    const seen = new Set<string>();
    const ranking: HitRanking[] = [];
    this.hits.forEach((hit, rank) => {
      const id = hitId(hit);
      if (id === null || seen.has(String(id))) {
        return;
      }
      seen.add(String(id));
      ranking.push({ id, score: hitScore(hit), rank });
    });
    return ranking;
  }
}

export interface SearchQueryRepositoryShape {
  /** Persist a new record and return it with its id. */
  save(query: SearchQuery): Effect.Effect<SearchQuery, StoreFailure>;
  findById(id: number): Effect.Effect<Option.Option<SearchQuery>, StoreFailure>;
}

export class SearchQueryRepository extends Context.Tag("SearchQueryRepository")<
  SearchQueryRepository,
  SearchQueryRepositoryShape
>() {}

export interface RecordQueryInput {
  index: string;
  user?: string | null;
  query: Record<string, unknown>;
  hits: ReadonlyArray<unknown>;
  totalHits: number;
  reference?: string;
  queryType?: QueryType;
  searchTerms?: string;
  executedAt: Date;
  /** Seconds. */
  duration: number;
}

/**
 * Build the record for an executed query. Values that are not JSON are
 * coerced to strings rather than rejected.
 */
export function toSearchQuery(input: RecordQueryInput): SearchQuery {
  const hits = toJsonValue(input.hits);
  return new SearchQuery({
    index: input.index,
    user: input.user ?? null,
    query: toJsonObject(input.query),
    hits: Array.isArray(hits) ? hits : [],
    totalHits: input.totalHits,
    reference: input.reference ?? "",
    queryType: input.queryType ?? "SEARCH",
    searchTerms: input.searchTerms,
    executedAt: input.executedAt,
    duration: input.duration,
  });
}

/**
 * Persist an executed query.
 */
export const recordQuery = (input: RecordQueryInput) =>
  Effect.gen(function* () {
    const repository = yield* SearchQueryRepository;
    const saved = yield* repository.save(toSearchQuery(input));
    yield* Effect.logDebug(
      `[SEARCH][query] Logged query ${saved.id} on ${saved.index}: ${saved.hits.length} of ${saved.totalHits} hits in ${saved.duration}s`
    );
    return saved;
  });

export interface ExecuteSearchInput {
  index: string;
  /** Raw engine query body. */
  query: Record<string, unknown>;
  user?: string | null;
  reference?: string;
  queryType?: QueryType;
  searchTerms?: string;
  /** Defaults to true; false returns the record without persisting it. */
  save?: boolean;
}

/**
 * Run a raw query body against the engine and log it.
 */
export const executeSearch = (input: ExecuteSearchInput) =>
  Effect.gen(function* () {
    const transport = yield* SearchTransport;
    const executedAt = new Date(yield* Clock.currentTimeMillis);
    const response = yield* transport.search(input.index, input.query);

    const record: RecordQueryInput = {
      index: input.index,
      user: input.user,
      query: input.query,
      hits: response.hits,
      totalHits: response.total,
      reference: input.reference,
      queryType: input.queryType,
      searchTerms: input.searchTerms,
      executedAt,
      duration: response.tookMs / 1000,
    };
    if (input.save === false) {
      return toSearchQuery(record);
    }
    return yield* recordQuery(record);
  }).pipe(Effect.withSpan("search.queryLog.executeSearch"));
