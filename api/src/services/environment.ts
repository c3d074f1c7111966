/**
 * Runtime configuration.
 *
 * Values are read through `effect`'s Config module, so they come from
 * environment variables by default and from any ConfigProvider in tests.
 */

import { Config, Context, Effect, Layer, Option } from "effect";
import type { UpdateStrategy } from "./search/types";

export interface EnvironmentShape {
  /** Search engine node URL. */
  readonly searchUrl: string;
  /** SQLite database holding the query log. */
  readonly databasePath: string;
  readonly updateStrategy: UpdateStrategy;
  /** When false the save/delete hooks do nothing. */
  readonly autoSync: boolean;
  /** Entity types the save/delete hooks always skip. */
  readonly neverAutoSync: ReadonlyArray<string>;
  /** Sync cache entry lifetime; null keeps entries until invalidated. */
  readonly cacheTtlSeconds: number | null;
  /** Passed to the engine as `retry_on_conflict` on partial updates. */
  readonly retryOnConflict: number;
  /** Actions per bulk request. */
  readonly bulkChunkSize: number;
}

export class Environment extends Context.Tag("Environment")<
  Environment,
  EnvironmentShape
>() {}

export const loadEnvironment = Effect.gen(function* () {
  const config = yield* Config.all({
    searchUrl: Config.string("SEARCH_URL").pipe(
      Config.withDefault("http://localhost:9200")
    ),
    databasePath: Config.string("SEARCH_DATABASE_PATH").pipe(
      Config.withDefault("search.db")
    ),
    updateStrategy: Config.literal("FULL", "PARTIAL")(
      "SEARCH_UPDATE_STRATEGY"
    ).pipe(Config.withDefault("FULL")),
    autoSync: Config.boolean("SEARCH_AUTO_SYNC").pipe(
      Config.withDefault(true)
    ),
    neverAutoSync: Config.array(Config.string(), "SEARCH_NEVER_AUTO_SYNC").pipe(
      Config.withDefault([])
    ),
    cacheTtlSeconds: Config.option(Config.integer("SEARCH_CACHE_TTL")),
    retryOnConflict: Config.integer("SEARCH_RETRY_ON_CONFLICT").pipe(
      Config.withDefault(0)
    ),
    bulkChunkSize: Config.integer("SEARCH_BULK_CHUNK_SIZE").pipe(
      Config.withDefault(500)
    ),
  });

  const environment: EnvironmentShape = {
    ...config,
    cacheTtlSeconds: Option.getOrNull(config.cacheTtlSeconds),
  };
  return environment;
});

export const EnvironmentLive = Layer.effect(Environment, loadEnvironment);
