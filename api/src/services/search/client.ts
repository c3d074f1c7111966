/**
 * Search transport interface.
 *
 * This module defines the abstract interface to the search engine, allowing
 * for dependency injection of different implementations. Every method
 * reports engine and network errors as a TransportFailure; none of them
 * retries.
 */

import { Context } from "effect";
import type { Effect } from "effect";
import type { TransportFailure } from "./errors";
import type {
  BulkResult,
  EntityId,
  FetchedDocument,
  RawSearchResponse,
  SearchAction,
  SearchDocument,
} from "./types";

export interface UpdateOptions {
  /** Times the engine retries the update on a version conflict. */
  retryOnConflict?: number;
}

/**
 * Abstract search transport for dependency injection.
 *
 * Implementations can be swapped for testing or alternative search backends.
 *
 * @example
 * ```typescript
 * // Production
 * const transport = new OpenSearchTransport("http://localhost:9200");
 *
 * // Testing
 * const layer = Layer.succeed(SearchTransport, fakeTransport);
 * ```
 */
export interface SearchTransportShape {
  /** Create or replace a document. */
  index(
    document: SearchDocument,
    id: EntityId,
    index: string
  ): Effect.Effect<void, TransportFailure>;

  /** Merge `body.doc` into an existing document. */
  update(
    body: { doc: SearchDocument },
    id: EntityId,
    index: string,
    options?: UpdateOptions
  ): Effect.Effect<void, TransportFailure>;

  delete(id: EntityId, index: string): Effect.Effect<void, TransportFailure>;

  get(id: EntityId, index: string): Effect.Effect<FetchedDocument, TransportFailure>;

  /** Submit bulk actions in one request. */
  bulk(
    actions: ReadonlyArray<SearchAction>
  ): Effect.Effect<BulkResult, TransportFailure>;

  /** Run a raw query body against an index. */
  search(
    index: string,
    body: Record<string, unknown>
  ): Effect.Effect<RawSearchResponse, TransportFailure>;

  /** True when the engine reports itself healthy. */
  healthCheck(): Effect.Effect<boolean>;
}

export class SearchTransport extends Context.Tag("SearchTransport")<
  SearchTransport,
  SearchTransportShape
>() {}
