/**
 * Search model registry.
 *
 * Ties each entity type to the record source that holds its search
 * queryset, so index-wide operations can find every record an index covers.
 */

import { Context, Effect, Layer, Option } from "effect";
import { IndexMappings } from "./mappings";
import type { IndexMappingsShape } from "./mappings";
import type { RecordSource } from "./ranking";
import type { DocumentSource } from "./types";

export interface SearchModel {
  readonly entityType: string;
  readonly source: RecordSource<DocumentSource>;
}

export interface SearchModelsShape {
  get(entityType: string): Option.Option<SearchModel>;
  /** Registered models mapped by `index`, in mapping order. */
  forIndex(index: string): ReadonlyArray<SearchModel>;
}

export class SearchModels extends Context.Tag("SearchModels")<
  SearchModels,
  SearchModelsShape
>() {}

export function makeSearchModels(
  models: ReadonlyArray<SearchModel>,
  mappings: IndexMappingsShape
): SearchModelsShape {
  const byType = new Map(models.map((model) => [model.entityType, model]));
  return {
    get: (entityType) => Option.fromNullable(byType.get(entityType)),
    forIndex: (index) =>
      mappings
        .entityTypes(index)
        .flatMap((entityType) => {
          const model = byType.get(entityType);
          return model === undefined ? [] : [model];
        }),
  };
}

export const SearchModelsLive = (models: ReadonlyArray<SearchModel>) =>
  Layer.effect(
    SearchModels,
    Effect.map(IndexMappings, (mappings) => makeSearchModels(models, mappings))
  );
