/**
 * Shared test fixtures: sample entities, a fake transport and a layer that
 * provides every search service in process.
 */

import { Effect, Layer, Option } from "effect";
import { vi } from "vitest";
import { Environment } from "../services/environment";
import type { EnvironmentShape } from "../services/environment";
import { SyncCache, makeMemorySyncCache } from "../services/search/cache";
import type { SyncCacheShape } from "../services/search/cache";
import { SearchTransport } from "../services/search/client";
import type { SearchTransportShape } from "../services/search/client";
import { IndexMappings, makeIndexMappings } from "../services/search/mappings";
import type { IndexDefinitions } from "../services/search/mappings";
import { SearchModels, makeSearchModels } from "../services/search/models";
import type { SearchModel } from "../services/search/models";
import { SearchQueryRepository } from "../services/search/query-log";
import type { SearchQuery, SearchQueryRepositoryShape } from "../services/search/query-log";
import type { DocumentSource, SearchDocument } from "../services/search/types";

export class Article implements DocumentSource {
  readonly entityType = "article";

  constructor(
    readonly id: number | null,
    public title: string,
    public views = 0,
    public checksum: unknown = "c0ffee"
  ) {}

  readField(field: string): unknown {
    switch (field) {
      case "title":
        return this.title;
      case "views":
        return this.views;
      case "checksum":
        return this.checksum;
      default:
        return undefined;
    }
  }

  asSearchDocument(): SearchDocument {
    return {
      title: this.title,
      views: this.views,
      checksum: this.checksum,
      internal_notes: "not mapped",
    };
  }
}

/** An entity type that takes part in retrieval only. */
export class Draft implements DocumentSource {
  readonly entityType = "draft";

  constructor(readonly id: number | null) {}

  readField(): unknown {
    return undefined;
  }
}

export const ARTICLE_INDEXES: IndexDefinitions = {
  articles: { article: ["title", "views", "checksum"] },
};

export function testEnvironment(
  overrides: Partial<EnvironmentShape> = {}
): EnvironmentShape {
  return {
    searchUrl: "http://localhost:9200",
    databasePath: ":memory:",
    updateStrategy: "FULL",
    autoSync: true,
    neverAutoSync: [],
    cacheTtlSeconds: null,
    retryOnConflict: 0,
    bulkChunkSize: 500,
    ...overrides,
  };
}

export function makeFakeTransport() {
  return {
    index: vi.fn<SearchTransportShape["index"]>(() => Effect.void),
    update: vi.fn<SearchTransportShape["update"]>(() => Effect.void),
    delete: vi.fn<SearchTransportShape["delete"]>(() => Effect.void),
    get: vi.fn<SearchTransportShape["get"]>((id, index) =>
      Effect.succeed({ id: String(id), index, found: false, source: null })
    ),
    bulk: vi.fn<SearchTransportShape["bulk"]>((actions) =>
      Effect.succeed({ items: actions.length, tookMs: 1 })
    ),
    search: vi.fn<SearchTransportShape["search"]>(() =>
      Effect.succeed({ hits: [], total: 0, tookMs: 0 })
    ),
    healthCheck: vi.fn<SearchTransportShape["healthCheck"]>(() =>
      Effect.succeed(true)
    ),
  } satisfies SearchTransportShape;
}

export type FakeTransport = ReturnType<typeof makeFakeTransport>;

/**
 * Query log kept in an array; ids count up from 1.
 */
export function makeMemoryQueryRepository() {
  const saved: SearchQuery[] = [];
  const repository: SearchQueryRepositoryShape = {
    save: (query) =>
      Effect.sync(() => {
        const stored = query.withId(saved.length + 1);
        saved.push(stored);
        return stored;
      }),
    findById: (id) =>
      Effect.sync(() =>
        Option.fromNullable(saved.find((query) => query.id === id))
      ),
  };
  return { saved, repository };
}

export type TestServices =
  | SearchTransport
  | SyncCache
  | Environment
  | IndexMappings
  | SearchModels
  | SearchQueryRepository;

export interface TestServicesOptions {
  environment?: Partial<EnvironmentShape>;
  definitions?: IndexDefinitions;
  models?: ReadonlyArray<SearchModel>;
}

/**
 * Every search service, backed by fakes the test can inspect.
 */
export function makeTestServices(options: TestServicesOptions = {}) {
  const transport = makeFakeTransport();
  const cache: SyncCacheShape = Effect.runSync(makeMemorySyncCache(null));
  const queries = makeMemoryQueryRepository();
  const mappings = makeIndexMappings(options.definitions ?? ARTICLE_INDEXES);

  const layer: Layer.Layer<TestServices> = Layer.mergeAll(
    Layer.succeed(SearchTransport, transport),
    Layer.succeed(SyncCache, cache),
    Layer.succeed(Environment, testEnvironment(options.environment)),
    Layer.succeed(IndexMappings, mappings),
    Layer.succeed(SearchModels, makeSearchModels(options.models ?? [], mappings)),
    Layer.succeed(SearchQueryRepository, queries.repository)
  );

  const run = <A, E>(effect: Effect.Effect<A, E, TestServices>) =>
    Effect.runPromise(Effect.provide(effect, layer));
  /** Run an effect that is expected to fail and return its error. */
  const failure = <A, E>(effect: Effect.Effect<A, E, TestServices>) =>
    Effect.runPromise(Effect.provide(Effect.flip(effect), layer));

  return { transport, cache, queries, layer, run, failure };
}
