/**
 * OpenSearch transport implementation.
 *
 * This module provides the concrete implementation of the SearchTransport
 * interface using OpenSearch as the backend.
 */

import { Client, errors } from "@opensearch-project/opensearch";
import { Effect, Layer, Schema } from "effect";
import { Environment } from "../environment";
import { SearchTransport } from "./client";
import type { SearchTransportShape, UpdateOptions } from "./client";
import { TransportFailure } from "./errors";
import type {
  BulkResult,
  EntityId,
  FetchedDocument,
  RawSearchResponse,
  SearchAction,
  SearchDocument,
} from "./types";

const GetResponseBody = Schema.Struct({
  _id: Schema.String,
  _index: Schema.String,
  found: Schema.Boolean,
  _source: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Unknown })
  ),
});

const SearchResponseBody = Schema.Struct({
  took: Schema.Number,
  hits: Schema.Struct({
    total: Schema.optional(
      Schema.Union(Schema.Number, Schema.Struct({ value: Schema.Number }))
    ),
    hits: Schema.Array(
      Schema.Struct({
        _id: Schema.String,
        _index: Schema.String,
        _score: Schema.optional(Schema.NullOr(Schema.Number)),
      })
    ),
  }),
});

const BulkItemResult = Schema.Struct({
  status: Schema.Number,
  error: Schema.optional(
    Schema.Struct({ type: Schema.String, reason: Schema.optional(Schema.String) })
  ),
});

const BulkResponseBody = Schema.Struct({
  took: Schema.Number,
  errors: Schema.Boolean,
  items: Schema.Array(
    Schema.Record({ key: Schema.String, value: BulkItemResult })
  ),
});

/**
 * Map a client error to a TransportFailure.
 *
 * Response errors keep the engine's status; connection and timeout errors
 * have no response and get status 0.
 */
export function toTransportFailure(error: unknown): TransportFailure {
  if (error instanceof errors.ResponseError) {
    return new TransportFailure(error.statusCode, error.message, error.body);
  }
  if (error instanceof Error) {
    return new TransportFailure(0, error.message, error);
  }
  return new TransportFailure(0, String(error), error);
}

/**
 * Decode an engine response body, reporting a malformed one as a 502.
 */
const decodeBody = <A, I>(schema: Schema.Schema<A, I>, body: unknown) =>
  Schema.decodeUnknown(schema)(body).pipe(
    Effect.mapError(
      (error) =>
        new TransportFailure(502, "Unexpected response from search engine", error)
    )
  );

/**
 * Expand bulk actions into the newline-delimited body the bulk API takes:
 * an action line, followed by a source line for index and update.
 */
export function toBulkBody(
  actions: ReadonlyArray<SearchAction>
): Array<Record<string, unknown>> {
  const lines: Array<Record<string, unknown>> = [];
  for (const action of actions) {
    const meta = {
      _index: action._index,
      ...(action._id === null ? {} : { _id: String(action._id) }),
    };
    switch (action._op_type) {
      case "index":
        lines.push({ index: meta }, action._source);
        break;
      case "update":
        lines.push({ update: meta }, { doc: action.doc });
        break;
      case "delete":
        lines.push({ delete: meta });
        break;
    }
  }
  return lines;
}

/**
 * Reduce a raw search response body to hits, total and timing.
 */
export const parseSearchResponse = (body: unknown) =>
  decodeBody(SearchResponseBody, body).pipe(
    Effect.map((decoded): RawSearchResponse => {
      const total = decoded.hits.total;
      return {
        hits: decoded.hits.hits.map((hit) => ({
          id: hit._id,
          score: hit._score ?? null,
          index: hit._index,
        })),
        total:
          total === undefined
            ? decoded.hits.hits.length
            : typeof total === "number"
              ? total
              : total.value,
        tookMs: decoded.took,
      };
    })
  );

/**
 * Check a bulk response body, failing on the first item the engine rejected.
 */
export const parseBulkResponse = (body: unknown) =>
  Effect.gen(function* () {
    const decoded = yield* decodeBody(BulkResponseBody, body);
    if (decoded.errors) {
      const failed = decoded.items
        .flatMap((item) => Object.values(item))
        .filter((result) => result.error !== undefined || result.status >= 300);
      const first = failed[0];
      return yield* Effect.fail(
        new TransportFailure(
          first?.status ?? 500,
          first?.error?.reason ?? first?.error?.type ?? "Bulk request failed",
          failed
        )
      );
    }
    const result: BulkResult = {
      items: decoded.items.length,
      tookMs: decoded.took,
    };
    return result;
  });

/**
 * OpenSearch transport implementation.
 *
 * @example
 * ```typescript
 * const transport = new OpenSearchTransport("http://localhost:9200");
 * await Effect.runPromise(transport.healthCheck());
 *
 * await Effect.runPromise(
 *   transport.index({ title: "Rust in production" }, 42, "articles")
 * );
 * ```
 */
export class OpenSearchTransport implements SearchTransportShape {
  private client: Client;

  /**
   * Create a new OpenSearch transport.
   *
   * @param nodeUrl - The OpenSearch server URL
   */
  constructor(nodeUrl: string) {
    this.client = new Client({ node: nodeUrl });
  }

  index(document: SearchDocument, id: EntityId, index: string) {
    return Effect.tryPromise({
      try: () => this.client.index({ index, id: String(id), body: document }),
      catch: toTransportFailure,
    }).pipe(Effect.asVoid, Effect.withSpan("search.transport.index"));
  }

  update(
    body: { doc: SearchDocument },
    id: EntityId,
    index: string,
    options: UpdateOptions = {}
  ) {
    return Effect.tryPromise({
      try: () =>
        this.client.update({
          index,
          id: String(id),
          body,
          retry_on_conflict: options.retryOnConflict,
        }),
      catch: toTransportFailure,
    }).pipe(Effect.asVoid, Effect.withSpan("search.transport.update"));
  }

  delete(id: EntityId, index: string) {
    return Effect.tryPromise({
      try: () => this.client.delete({ index, id: String(id) }),
      catch: toTransportFailure,
    }).pipe(Effect.asVoid, Effect.withSpan("search.transport.delete"));
  }

  get(id: EntityId, index: string) {
    return Effect.tryPromise({
      try: () => this.client.get({ index, id: String(id) }),
      catch: toTransportFailure,
    }).pipe(
      Effect.flatMap((response) => decodeBody(GetResponseBody, response.body)),
      Effect.map(
        (decoded): FetchedDocument => ({
          id: decoded._id,
          index: decoded._index,
          found: decoded.found,
          source: decoded._source ?? null,
        })
      ),
      Effect.withSpan("search.transport.get")
    );
  }

  bulk(actions: ReadonlyArray<SearchAction>) {
    return Effect.tryPromise({
      try: () => this.client.bulk({ body: toBulkBody(actions) }),
      catch: toTransportFailure,
    }).pipe(
      Effect.flatMap((response) => parseBulkResponse(response.body)),
      Effect.withSpan("search.transport.bulk")
    );
  }

  search(index: string, body: Record<string, unknown>) {
    return Effect.tryPromise({
      try: () => this.client.search({ index, body }),
      catch: toTransportFailure,
    }).pipe(
      Effect.flatMap((response) => parseSearchResponse(response.body)),
      Effect.withSpan("search.transport.search")
    );
  }

  /**
   * Check if the search engine is healthy.
   */
  healthCheck() {
    return Effect.tryPromise(() => this.client.cluster.health({})).pipe(
      Effect.map((health) => health.statusCode === 200),
      Effect.orElseSucceed(() => false)
    );
  }
}

export const OpenSearchTransportLive = Layer.effect(
  SearchTransport,
  Effect.map(
    Environment,
    (environment) => new OpenSearchTransport(environment.searchUrl)
  )
);
