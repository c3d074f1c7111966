/**
 * Search sync.
 *
 * Keeps a search index in step with backing-store records, logs executed
 * queries, and maps hits back onto records in relevance order.
 *
 * @example
 * ```typescript
 * import { Layer, ManagedRuntime } from "effect";
 * import { Hono } from "hono";
 *
 * const SearchLive = Layer.mergeAll(
 *   OpenSearchTransportLive,
 *   SyncCacheLive,
 *   SqliteSearchQueryRepositoryLive.pipe(Layer.provide(SqliteDatabaseLive)),
 *   SearchModelsLive(models),
 * ).pipe(
 *   Layer.provideMerge(IndexMappingsFromDefinitions(definitions)),
 *   Layer.provideMerge(EnvironmentLive),
 * );
 *
 * const runtime = ManagedRuntime.make(SearchLive);
 * const app = new Hono();
 * app.route("/search", createSearchRouter(runtime));
 * ```
 */

export * from "./services/search";
export { Environment, EnvironmentLive, loadEnvironment } from "./services/environment";
export type { EnvironmentShape } from "./services/environment";
export { createSearchRouter } from "./search";
export type { SearchRouterServices } from "./search";
export { createCli, runIndexCommand } from "./commands";
export type { CommandServices, IndexCommandResult } from "./commands";
