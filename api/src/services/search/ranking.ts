/**
 * Ranked retrieval.
 *
 * Maps the ordered hits of a logged query back onto backing-store records
 * in a single store call, keeping the engine's order and attaching each
 * record's score and rank.
 */

import { Effect } from "effect";
import type { StoreFailure } from "./errors";
import type { SearchQuery } from "./query-log";
import type { EntityId, HitRanking } from "./types";

/**
 * A record with the two computed ranking columns attached.
 */
export interface RankedRecord<E> {
  readonly record: E;
  /** Engine score for the record's id, 0 when the hit had none. */
  readonly searchScore: number;
  /** 0-based position of the record's id in the hit list. */
  readonly searchRank: number;
}

/**
 * The backing-store side of ranked retrieval.
 *
 * A source covers the "search queryset" of one entity type: the records
 * that belong in the index.
 */
export interface RecordSource<E> {
  /**
   * Fetch the records whose ids appear in `ranking`, ordered by rank.
   *
   * Must be a single round trip; ids without a record are left out.
   */
  rankByIds(
    ranking: ReadonlyArray<HitRanking>
  ): Effect.Effect<ReadonlyArray<RankedRecord<E>>, StoreFailure>;
  /** Whether a record with this id is in the search queryset. */
  exists(id: EntityId): Effect.Effect<boolean, StoreFailure>;
  /** Every record in the search queryset. */
  all(): Effect.Effect<ReadonlyArray<E>, StoreFailure>;
}

/**
 * Ordered, annotated records for the hits of `searchQuery`.
 */
export const fromSearchQuery = <E>(
  source: RecordSource<E>,
  searchQuery: SearchQuery
): Effect.Effect<ReadonlyArray<RankedRecord<E>>, StoreFailure> => {
  const ranking = searchQuery.ranking;
  if (ranking.length === 0) {
    return Effect.succeed([]);
  }
  return source.rankByIds(ranking).pipe(
    Effect.tap((records) =>
      Effect.logDebug(
        `[SEARCH][rank] ${records.length} of ${ranking.length} hits found in the backing store`
      )
    )
  );
};

/**
 * Whether the record with `id` belongs in the index.
 */
export const inSearchIndex = <E>(source: RecordSource<E>, id: EntityId) =>
  source.exists(id);

/**
 * A record source over an in-memory list.
 *
 * Ranks by re-joining the list against the hit order in one pass.
 */
export class MemoryRecordSource<E> implements RecordSource<E> {
  constructor(
    private readonly records: ReadonlyArray<E>,
    private readonly idOf: (record: E) => EntityId
  ) {}

  rankByIds(ranking: ReadonlyArray<HitRanking>) {
    const positions = new Map<string, HitRanking>();
    for (const entry of ranking) {
      const key = String(entry.id);
      if (!positions.has(key)) {
        positions.set(key, entry);
      }
    }
    return Effect.sync(() => {
      const ranked: RankedRecord<E>[] = [];
      for (const record of this.records) {
        const entry = positions.get(String(this.idOf(record)));
        if (entry !== undefined) {
          ranked.push({
            record,
            searchScore: entry.score,
            searchRank: entry.rank,
          });
        }
      }
      return ranked.sort((a, b) => a.searchRank - b.searchRank);
    });
  }

  exists(id: EntityId) {
    return Effect.sync(() =>
      this.records.some((record) => String(this.idOf(record)) === String(id))
    );
  }

  all() {
    return Effect.succeed(this.records);
  }
}
