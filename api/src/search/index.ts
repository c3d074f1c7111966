/**
 * Search route handler.
 *
 * Runs raw engine queries, logs them, and returns the matching records in
 * relevance order.
 */

import { Effect, Either } from "effect";
import type { ManagedRuntime } from "effect";
import { Hono } from "hono";
import type { Environment } from "../services/environment";
import {
  SearchModels,
  SearchTransport,
  buildDocument,
  executeSearch,
  fromSearchQuery,
  toJsonValue,
} from "../services/search";
import type {
  EntityId,
  IndexMappings,
  JsonValue,
  QueryType,
  SearchQueryRepository,
  SyncError,
} from "../services/search";

/**
 * Services the router's programs need.
 */
export type SearchRouterServices =
  | SearchTransport
  | SearchQueryRepository
  | SearchModels
  | IndexMappings
  | Environment;

interface SearchResult {
  id: EntityId | null;
  searchScore: number;
  searchRank: number;
  document: JsonValue;
}

/**
 * Valid query type values.
 */
const VALID_QUERY_TYPES: Set<QueryType> = new Set([
  "SEARCH",
  "SUGGEST",
  "ADMIN",
  "ERROR",
]);

const isQueryType = (value: string): value is QueryType =>
  Array.from(VALID_QUERY_TYPES).some((queryType) => queryType === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * HTTP status for a failed search program.
 */
function statusFor(error: SyncError): 400 | 409 | 422 | 500 | 502 {
  switch (error._tag) {
    case "InvalidArgument":
      return 400;
    case "InvalidUpdate":
    case "InvalidDocument":
      return 422;
    case "InvalidState":
      return 409;
    case "TransportFailure":
      return 502;
    case "NotImplemented":
    case "StoreFailure":
      return 500;
  }
}

/**
 * Create the search router with a runtime that provides the search services.
 *
 * @param runtime - Runtime built from the search service layers
 * @returns Configured Hono router
 *
 * @example
 * ```typescript
 * import { ManagedRuntime } from "effect";
 * import { createSearchRouter } from "./src/search";
 *
 * const runtime = ManagedRuntime.make(SearchLive);
 * app.route("/search", createSearchRouter(runtime));
 * ```
 */
export function createSearchRouter<E>(
  runtime: ManagedRuntime.ManagedRuntime<SearchRouterServices, E>
) {
  const router = new Hono();

  /**
   * POST /search/:index
   *
   * Execute a raw query body against an index.
   *
   * Query Parameters:
   * - model: Entity type to map hits onto (required when the index maps several)
   * - user: Id of the querying user (optional)
   * - reference: Free-text tag stored with the query (optional)
   * - type: Query type, one of SEARCH, SUGGEST, ADMIN, ERROR (default: SEARCH)
   *
   * Response:
   * - 200: Query figures and ranked results
   * - 400: Invalid request, or several models and none chosen
   * - 404: Unknown model
   * - 502: Search engine error
   * - 500: Search failed
   */
  router.post("/:index", async (c) => {
    const index = c.req.param("index");
    const modelParam = c.req.query("model");
    const typeParam = c.req.query("type") ?? "SEARCH";

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        { error: "Invalid body", message: "Request body must be JSON" },
        400
      );
    }
    if (!isRecord(body)) {
      return c.json(
        { error: "Invalid body", message: "Request body must be a JSON object" },
        400
      );
    }

    if (!isQueryType(typeParam)) {
      return c.json(
        {
          error: "Invalid parameter",
          message: `Invalid type '${typeParam}'. Valid values: ${Array.from(VALID_QUERY_TYPES).join(", ")}`,
        },
        400
      );
    }

    const query = body;
    try {
      const models = await runtime.runPromise(
        Effect.map(SearchModels, (registry) => registry.forIndex(index))
      );
      if (modelParam === undefined && models.length > 1) {
        return c.json(
          {
            error: "Missing required parameter",
            message: `Index '${index}' covers several models; pass one of: ${models.map((candidate) => candidate.entityType).join(", ")}`,
          },
          400
        );
      }
      const model =
        modelParam === undefined
          ? models[0]
          : models.find((candidate) => candidate.entityType === modelParam);
      if (modelParam !== undefined && model === undefined) {
        return c.json(
          {
            error: "Not found",
            message: `Index '${index}' has no model '${modelParam}'`,
          },
          404
        );
      }

      const program = Effect.gen(function* () {
        const searchQuery = yield* executeSearch({
          index,
          query,
          user: c.req.query("user") ?? null,
          reference: c.req.query("reference") ?? "",
          queryType: typeParam,
        });

        const ranked =
          model === undefined
            ? []
            : yield* fromSearchQuery(model.source, searchQuery);
        const results: SearchResult[] = [];
        for (const { record, searchScore, searchRank } of ranked) {
          results.push({
            id: record.id,
            searchScore,
            searchRank,
            document: toJsonValue(yield* buildDocument(record, index)),
          });
        }

        return {
          model: model?.entityType ?? null,
          query: {
            id: searchQuery.id,
            searchTerms: searchQuery.searchTerms,
            totalHits: searchQuery.totalHits,
            pageFrom: searchQuery.pageFrom,
            pageTo: searchQuery.pageTo,
            pageSize: searchQuery.pageSize,
            maxScore: searchQuery.maxScore,
            minScore: searchQuery.minScore,
            duration: searchQuery.duration,
          },
          results,
        };
      });

      const outcome = await runtime.runPromise(Effect.either(program));
      if (Either.isLeft(outcome)) {
        const error = outcome.left;
        if (statusFor(error) === 500) {
          console.error("[SEARCH] Search error:", error);
        }
        return c.json(
          { error: "Search failed", message: error.message },
          statusFor(error)
        );
      }
      return c.json(outcome.right);
    } catch (error) {
      console.error("[SEARCH] Search error:", error);
      return c.json(
        {
          error: "Search failed",
          message:
            error instanceof Error ? error.message : "An unexpected error occurred",
        },
        500
      );
    }
  });

  /**
   * GET /search/health
   *
   * Check the health of the search engine.
   *
   * Response:
   * - 200: { status: "healthy" }
   * - 503: { status: "unhealthy" }
   */
  router.get("/health", async (c) => {
    try {
      const healthy = await runtime.runPromise(
        Effect.flatMap(SearchTransport, (transport) => transport.healthCheck())
      );
      if (healthy) {
        return c.json({ status: "healthy" });
      }
      return c.json({ status: "unhealthy" }, 503);
    } catch (error) {
      console.error("[SEARCH] Health check error:", error);
      return c.json({ status: "unhealthy" }, 503);
    }
  });

  return router;
}
