/**
 * Index synchronization.
 *
 * Hooks for keeping documents in step with record saves and deletes, and
 * the bulk push of a whole index.
 */

import { Array as Arr, Effect, Option } from "effect";
import { Environment } from "../environment";
import { IndexMappings } from "./mappings";
import { SearchModels } from "./models";
import { inSearchIndex } from "./ranking";
import type { DocumentSource, WriteOutcome } from "./types";
import { asSearchAction, deleteDocument, indexDocument, submitActions, updateDocument } from "./writer";

export interface IndexOutcome {
  index: string;
  outcome: WriteOutcome;
}

export interface SaveOptions {
  /** Fields changed by the save; empty or absent means a full re-index. */
  updateFields?: ReadonlyArray<string>;
}

/**
 * Whether the save/delete hooks apply to this entity type.
 */
const autoSyncEnabled = (entity: DocumentSource) =>
  Effect.map(
    Environment,
    ({ autoSync, neverAutoSync }) =>
      autoSync && !neverAutoSync.includes(entity.entityType)
  );

/**
 * Bring every index that maps the entity in line with a save.
 *
 * A record that has left its search queryset is removed from the index.
 * Otherwise a save with update fields is sent as a partial update, and one
 * without as a full index.
 */
export const syncOnSave = (entity: DocumentSource, options: SaveOptions = {}) =>
  Effect.gen(function* () {
    if (!(yield* autoSyncEnabled(entity))) {
      yield* Effect.logDebug(
        `[SEARCH][sync] Auto-sync disabled for ${entity.entityType}`
      );
      return [];
    }
    const mappings = yield* IndexMappings;
    const models = yield* SearchModels;
    const model = models.get(entity.entityType);
    const updateFields = options.updateFields ?? [];

    const outcomes: IndexOutcome[] = [];
    for (const index of mappings.indexesFor(entity.entityType)) {
      const inQueryset =
        Option.isNone(model) || entity.id === null
          ? true
          : yield* inSearchIndex(model.value.source, entity.id);

      const outcome = !inQueryset
        ? yield* deleteDocument(entity, index)
        : updateFields.length > 0
          ? yield* updateDocument(entity, index, updateFields)
          : yield* indexDocument(entity, index);
      outcomes.push({ index, outcome });
    }
    return outcomes;
  });

/**
 * Remove the entity's document from every index that maps it.
 */
export const syncOnDelete = (entity: DocumentSource) =>
  Effect.gen(function* () {
    if (!(yield* autoSyncEnabled(entity))) {
      return [];
    }
    const mappings = yield* IndexMappings;
    const outcomes: IndexOutcome[] = [];
    for (const index of mappings.indexesFor(entity.entityType)) {
      outcomes.push({ index, outcome: yield* deleteDocument(entity, index) });
    }
    return outcomes;
  });

/**
 * Push every record of every model in `index` to the engine, in bulk
 * requests of SEARCH_BULK_CHUNK_SIZE actions.
 */
export const updateIndex = (index: string) =>
  Effect.gen(function* () {
    const { bulkChunkSize } = yield* Environment;
    const models = yield* SearchModels;

    let documents = 0;
    for (const model of models.forIndex(index)) {
      const records = yield* model.source.all();
      const actions = yield* Effect.forEach(records, (record) =>
        asSearchAction(record, index, "index")
      );
      for (const chunk of Arr.chunksOf(actions, Math.max(1, bulkChunkSize))) {
        yield* submitActions(chunk);
      }
      yield* Effect.logInfo(
        `[SEARCH][bulk] Indexed ${actions.length} ${model.entityType} documents in ${index}`
      );
      documents += actions.length;
    }
    return { index, documents };
  }).pipe(Effect.withSpan("search.sync.updateIndex"));
