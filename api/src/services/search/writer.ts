/**
 * Document writer.
 *
 * Applies index, update and delete operations for one entity and one index,
 * guarded by the sync cache. Transport failures are not retried here; they
 * propagate to the caller after the cache has been put back in a state that
 * matches what the engine holds.
 */

import { Effect, Option } from "effect";
import { Environment } from "../environment";
import { SyncCache, computeCacheKey } from "./cache";
import { SearchTransport } from "./client";
import { buildDocument, buildUpdateDocument } from "./document";
import { InvalidArgument, InvalidState } from "./errors";
import type {
  DocumentSource,
  EntityId,
  SearchAction,
  SearchActionType,
  WriteOutcome,
} from "./types";

const requireId = (
  entity: DocumentSource,
  operation: string
): Effect.Effect<EntityId, InvalidState> =>
  entity.id === null
    ? Effect.fail(
        new InvalidState(
          `Cannot ${operation} '${entity.entityType}' before it has an id`
        )
      )
    : Effect.succeed(entity.id);

const cacheKey = (entity: DocumentSource, index: string) =>
  computeCacheKey(entity.entityType, entity.id, index);

/**
 * Create or replace the entity's document in `index`.
 *
 * Skips the engine when the document is identical to the last one written.
 * The cache entry is claimed before the engine call and released again if
 * that call fails, dies or is interrupted.
 */
export const indexDocument = (entity: DocumentSource, index: string) =>
  Effect.gen(function* () {
    const id = yield* requireId(entity, "index");
    const transport = yield* SearchTransport;
    const cache = yield* SyncCache;

    const document = yield* buildDocument(entity, index);
    const key = cacheKey(entity, index);

    const duplicate = yield* cache.checkAndSet(key, document);
    if (duplicate) {
      yield* Effect.logDebug(
        `[SEARCH][index] Skipping ${entity.entityType} ${id} in ${index}: document unchanged`
      );
      return "duplicate" satisfies WriteOutcome;
    }

    yield* transport
      .index(document, id, index)
      .pipe(Effect.onError(() => cache.invalidateIf(key, document)));
    yield* Effect.logInfo(
      `[SEARCH][index] Indexed ${entity.entityType} ${id} in ${index}`
    );
    return "indexed" satisfies WriteOutcome;
  }).pipe(Effect.withSpan("search.writer.indexDocument"));

/**
 * Send a partial update for the entity's document in `index`.
 *
 * An update document with no fields means nothing requested is eligible
 * for the index, and no request is made.
 */
export const updateDocument = (
  entity: DocumentSource,
  index: string,
  updateFields: ReadonlyArray<string>
) =>
  Effect.gen(function* () {
    const id = yield* requireId(entity, "update");
    const transport = yield* SearchTransport;
    const cache = yield* SyncCache;
    const { updateStrategy, retryOnConflict } = yield* Environment;

    const document = yield* buildUpdateDocument(entity, index, updateFields);
    if (Object.keys(document).length === 0) {
      yield* Effect.logDebug(
        `[SEARCH][update] Ignoring ${entity.entityType} ${id} in ${index}: update document is empty`
      );
      return "empty" satisfies WriteOutcome;
    }

    yield* transport.update({ doc: document }, id, index, { retryOnConflict });

    const key = cacheKey(entity, index);
    if (updateStrategy === "FULL") {
      yield* cache.set(key, document);
    } else {
      const previous = yield* cache.get(key);
      yield* cache.set(
        key,
        Option.match(previous, {
          onNone: () => document,
          onSome: (cached) => ({ ...cached, ...document }),
        })
      );
    }
    yield* Effect.logInfo(
      `[SEARCH][update] Updated ${entity.entityType} ${id} in ${index} (${Object.keys(document).join(", ")})`
    );
    return "updated" satisfies WriteOutcome;
  }).pipe(Effect.withSpan("search.writer.updateDocument"));

/**
 * Remove the entity's document from `index`.
 *
 * The cache entry goes whether or not the engine call succeeds, so a later
 * re-index of the same content is never mistaken for a duplicate.
 */
export const deleteDocument = (entity: DocumentSource, index: string) =>
  Effect.gen(function* () {
    const id = yield* requireId(entity, "delete");
    const transport = yield* SearchTransport;
    const cache = yield* SyncCache;

    yield* transport
      .delete(id, index)
      .pipe(Effect.ensuring(cache.invalidate(cacheKey(entity, index))));
    yield* Effect.logInfo(
      `[SEARCH][delete] Deleted ${entity.entityType} ${id} from ${index}`
    );
    const outcome: WriteOutcome = "deleted";
    return outcome;
  }).pipe(Effect.withSpan("search.writer.deleteDocument"));

/**
 * Read the entity's document straight from the engine.
 */
export const fetchDocument = (entity: DocumentSource, index: string) =>
  Effect.gen(function* () {
    const id = yield* requireId(entity, "fetch");
    const transport = yield* SearchTransport;
    return yield* transport.get(id, index);
  });

const isActionType = (action: string): action is SearchActionType =>
  action === "index" || action === "update" || action === "delete";

/**
 * Shape the entity as a bulk action record.
 *
 * `update` carries the full document; callers wanting a partial body can
 * replace `doc`.
 */
export const asSearchAction = (
  entity: DocumentSource,
  index: string,
  action: string
) =>
  Effect.gen(function* () {
    if (!isActionType(action)) {
      return yield* Effect.fail(
        new InvalidArgument(`Invalid search action '${action}'`)
      );
    }
    switch (action) {
      case "index": {
        const source = yield* buildDocument(entity, index);
        const record: SearchAction = {
          _index: index,
          _op_type: "index",
          _id: entity.id,
          _source: source,
        };
        return record;
      }
      case "update": {
        const doc = yield* buildDocument(entity, index);
        const record: SearchAction = {
          _index: index,
          _op_type: "update",
          _id: entity.id,
          doc,
        };
        return record;
      }
      case "delete": {
        const record: SearchAction = {
          _index: index,
          _op_type: "delete",
          _id: entity.id,
        };
        return record;
      }
    }
  });

/**
 * Submit bulk actions through the transport.
 */
export const submitActions = (actions: ReadonlyArray<SearchAction>) =>
  Effect.flatMap(SearchTransport, (transport) => transport.bulk(actions));
