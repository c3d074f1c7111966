/**
 * Sync cache.
 *
 * Remembers the digest of the last document written for each
 * (entity type, id, index), so an index call that would send the same
 * document again can be skipped.
 */

import { createHash } from "node:crypto";
import { Clock, Context, Effect, HashMap, Layer, Option, Ref } from "effect";
import { Environment } from "../environment";
import { canonicalJson, toJsonValue } from "./serialization";
import type { EntityId, SearchDocument } from "./types";

export interface SyncCacheShape {
  /**
   * Store `document` under `key` unless it is already there.
   *
   * @returns true when the stored document is the same (nothing changed)
   */
  checkAndSet(key: string, document: SearchDocument): Effect.Effect<boolean>;
  get(key: string): Effect.Effect<Option.Option<SearchDocument>>;
  set(key: string, document: SearchDocument): Effect.Effect<void>;
  invalidate(key: string): Effect.Effect<void>;
  /** Remove the entry only while it still holds `document`. */
  invalidateIf(key: string, document: SearchDocument): Effect.Effect<void>;
}

export class SyncCache extends Context.Tag("SyncCache")<
  SyncCache,
  SyncCacheShape
>() {}

interface CacheEntry {
  readonly digest: string;
  readonly document: SearchDocument;
  readonly expiresAt: number | null;
}

export function computeCacheKey(
  entityType: string,
  id: EntityId | null,
  index: string
): string {
  return `search-sync:${entityType}.${id ?? "new"}.${index}`;
}

export function documentDigest(document: SearchDocument): string {
  return createHash("sha1")
    .update(canonicalJson(toJsonValue(document)))
    .digest("hex");
}

/**
 * In-process cache. Every read-modify-write goes through a single
 * `Ref.modify`, so concurrent fibers see each other's claims.
 */
export const makeMemorySyncCache = (ttlSeconds: number | null) =>
  Effect.gen(function* () {
    const entries = yield* Ref.make(HashMap.empty<string, CacheEntry>());

    const isLive = (entry: CacheEntry, now: number) =>
      entry.expiresAt === null || entry.expiresAt > now;

    const entryFor = (document: SearchDocument, now: number): CacheEntry => ({
      digest: documentDigest(document),
      document,
      expiresAt: ttlSeconds === null ? null : now + ttlSeconds * 1000,
    });

    const lookup = (key: string) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const map = yield* Ref.get(entries);
        return HashMap.get(map, key).pipe(
          Option.filter((entry) => isLive(entry, now))
        );
      });

    const cache: SyncCacheShape = {
      checkAndSet: (key, document) =>
        Effect.gen(function* () {
          const now = yield* Clock.currentTimeMillis;
          const next = entryFor(document, now);
          return yield* Ref.modify(
            entries,
            (map): readonly [boolean, HashMap.HashMap<string, CacheEntry>] => {
              const current = HashMap.get(map, key);
              if (
                Option.isSome(current) &&
                isLive(current.value, now) &&
                current.value.digest === next.digest
              ) {
                return [true, map];
              }
              return [false, HashMap.set(map, key, next)];
            }
          );
        }),

      get: (key) =>
        lookup(key).pipe(
          Effect.map((entry) => Option.map(entry, ({ document }) => document))
        ),

      set: (key, document) =>
        Effect.gen(function* () {
          const now = yield* Clock.currentTimeMillis;
          yield* Ref.update(entries, HashMap.set(key, entryFor(document, now)));
        }),

      invalidate: (key) => Ref.update(entries, HashMap.remove(key)),

      invalidateIf: (key, document) => {
        const digest = documentDigest(document);
        return Ref.update(entries, (map) =>
          HashMap.get(map, key).pipe(
            Option.filter((entry) => entry.digest === digest),
            Option.match({
              onNone: () => map,
              onSome: () => HashMap.remove(map, key),
            })
          )
        );
      },
    };
    return cache;
  });

export const SyncCacheLive = Layer.effect(
  SyncCache,
  Effect.flatMap(Environment, (environment) =>
    makeMemorySyncCache(environment.cacheTtlSeconds)
  )
);
