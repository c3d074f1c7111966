/**
 * Index mappings.
 *
 * Each index declares, per entity type, the document properties it holds.
 * Loading the definitions (from mapping files, settings, ...) is left to the
 * caller; this module only answers lookups.
 */

import { Context, Layer, Option } from "effect";

/**
 * Index name to entity type to mapped property names.
 *
 * @example
 * ```typescript
 * const definitions: IndexDefinitions = {
 *   articles: { article: ["title", "body", "published_at"] },
 * };
 * ```
 */
export type IndexDefinitions = Readonly<
  Record<string, Readonly<Record<string, ReadonlyArray<string>>>>
>;

export interface IndexMappingsShape {
  /** Mapped properties of `entityType` in `index`, if the index maps it. */
  properties(index: string, entityType: string): Option.Option<ReadonlyArray<string>>;
  /** Indexes that map `entityType`. */
  indexesFor(entityType: string): ReadonlyArray<string>;
  /** Entity types mapped by `index`. */
  entityTypes(index: string): ReadonlyArray<string>;
}

export class IndexMappings extends Context.Tag("IndexMappings")<
  IndexMappings,
  IndexMappingsShape
>() {}

export function makeIndexMappings(
  definitions: IndexDefinitions
): IndexMappingsShape {
  return {
    properties: (index, entityType) =>
      Option.fromNullable(definitions[index]?.[entityType]),
    indexesFor: (entityType) =>
      Object.keys(definitions).filter(
        (index) => definitions[index]?.[entityType] !== undefined
      ),
    entityTypes: (index) => Object.keys(definitions[index] ?? {}),
  };
}

export const IndexMappingsFromDefinitions = (definitions: IndexDefinitions) =>
  Layer.succeed(IndexMappings, makeIndexMappings(definitions));
