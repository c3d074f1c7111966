/**
 * SQLite adapters.
 *
 * A record source that ranks hits with one CASE/WHEN statement, and the
 * query log table. Both run on better-sqlite3, whose calls are synchronous
 * and are wrapped with Effect.try.
 */

import Database from "better-sqlite3";
import { Context, Effect, Layer, Option, Schema } from "effect";
import { Environment } from "../environment";
import { StoreFailure } from "./errors";
import { SearchQuery, SearchQueryRepository } from "./query-log";
import type { SearchQueryRepositoryShape } from "./query-log";
import type { RankedRecord, RecordSource } from "./ranking";
import { toJsonObject, toJsonValue } from "./serialization";
import type { EntityId, HitRanking } from "./types";

export class SqliteDatabase extends Context.Tag("SqliteDatabase")<
  SqliteDatabase,
  Database.Database
>() {}

const storeFailure = (action: string) => (error: unknown) =>
  new StoreFailure(
    `SQLite ${action} failed: ${error instanceof Error ? error.message : String(error)}`,
    error
  );

/**
 * Open the database named by SEARCH_DATABASE_PATH for the lifetime of the
 * layer.
 */
export const SqliteDatabaseLive = Layer.scoped(
  SqliteDatabase,
  Effect.acquireRelease(
    Effect.flatMap(Environment, (environment) =>
      Effect.try({
        try: () => new Database(environment.databasePath),
        catch: storeFailure("open"),
      })
    ),
    (db) => Effect.sync(() => db.close())
  )
);

/** Parameters bound into a statement. */
export type SqlParam = string | number;

export interface SqlStatement {
  sql: string;
  params: SqlParam[];
}

/**
 * Quote an identifier, doubling embedded quotes.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const isRow = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export interface SqliteRecordSourceOptions<E> {
  table: string;
  /** Defaults to "id". */
  idColumn?: string;
  /** Storage type of the id column; hit ids are converted to match. */
  idType?: "integer" | "text";
  /** SQL condition restricting the table to the search queryset. */
  where?: string;
  /** Build a record from a row (ranking columns removed). */
  fromRow: (row: Record<string, unknown>) => E;
}

/**
 * A record source over one SQLite table.
 *
 * @example
 * ```typescript
 * const articles = new SqliteRecordSource(db, {
 *   table: "articles",
 *   idType: "integer",
 *   where: "published = 1",
 *   fromRow: (row) => Article.fromRow(row),
 * });
 * const ranked = yield* fromSearchQuery(articles, searchQuery);
 * ```
 */
export class SqliteRecordSource<E> implements RecordSource<E> {
  constructor(
    private readonly db: Database.Database,
    private readonly options: SqliteRecordSourceOptions<E>
  ) {}

  private get table(): string {
    return quoteIdentifier(this.options.table);
  }

  private get idColumn(): string {
    return `${this.table}.${quoteIdentifier(this.options.idColumn ?? "id")}`;
  }

  private get restriction(): string {
    return this.options.where ? ` AND (${this.options.where})` : "";
  }

  /**
   * The id as the column stores it. Under `idType: "integer"` an id that is
   * not a safe integer cannot match a row and binds to null.
   */
  private bindId(id: EntityId): SqlParam | null {
    if (this.options.idType === "integer") {
      const value = typeof id === "number" ? id : Number(id);
      return Number.isSafeInteger(value) ? value : null;
    }
    return String(id);
  }

  /**
   * `CASE <id> WHEN ? THEN ? ... ELSE 0 END`, mapping each bound id to a value.
   */
  caseExpression(pairs: ReadonlyArray<readonly [SqlParam, number]>): SqlStatement {
    const whens = pairs.map(() => "WHEN ? THEN ?").join(" ");
    return {
      sql: `CASE ${this.idColumn} ${whens} ELSE 0 END`,
      params: pairs.flatMap(([id, value]) => [id, value]),
    };
  }

  /**
   * The single statement that fetches, annotates and orders the records
   * for `ranking`, or null when no id in it can match a row.
   */
  rankingStatement(ranking: ReadonlyArray<HitRanking>): SqlStatement | null {
    const bound = ranking.flatMap((entry) => {
      const id = this.bindId(entry.id);
      return id === null ? [] : [{ id, score: entry.score, rank: entry.rank }];
    });
    if (bound.length === 0) {
      return null;
    }
    const score = this.caseExpression(
      bound.map((entry) => [entry.id, entry.score] as const)
    );
    const rank = this.caseExpression(
      bound.map((entry) => [entry.id, entry.rank] as const)
    );
    const ids = bound.map((entry) => entry.id);
    const placeholders = ids.map(() => "?").join(", ");
    return {
      sql:
        `SELECT ${this.table}.*, (${score.sql}) AS "search_score", (${rank.sql}) AS "search_rank" ` +
        `FROM ${this.table} WHERE ${this.idColumn} IN (${placeholders})${this.restriction} ` +
        `ORDER BY "search_rank" ASC`,
      params: [...score.params, ...rank.params, ...ids],
    };
  }

  rankByIds(
    ranking: ReadonlyArray<HitRanking>
  ): Effect.Effect<ReadonlyArray<RankedRecord<E>>, StoreFailure> {
    const statement = this.rankingStatement(ranking);
    if (statement === null) {
      return Effect.succeed([]);
    }
    return Effect.try({
      try: () => this.db.prepare(statement.sql).all(...statement.params),
      catch: storeFailure("ranking query"),
    }).pipe(
      Effect.map((rows) => {
        const ranked: RankedRecord<E>[] = [];
        for (const row of rows) {
          if (!isRow(row)) {
            continue;
          }
          const { search_score, search_rank, ...fields } = row;
          ranked.push({
            record: this.options.fromRow(fields),
            searchScore: Number(search_score),
            searchRank: Number(search_rank),
          });
        }
        return ranked;
      })
    );
  }

  exists(id: EntityId): Effect.Effect<boolean, StoreFailure> {
    const bound = this.bindId(id);
    if (bound === null) {
      return Effect.succeed(false);
    }
    return Effect.try({
      try: () =>
        this.db
          .prepare(
            `SELECT 1 FROM ${this.table} WHERE ${this.idColumn} = ?${this.restriction} LIMIT 1`
          )
          .get(bound) !== undefined,
      catch: storeFailure("existence check"),
    });
  }

  all() {
    const where = this.options.where ? ` WHERE ${this.options.where}` : "";
    return Effect.try({
      try: () =>
        this.db
          .prepare(`SELECT * FROM ${this.table}${where} ORDER BY ${this.idColumn}`)
          .all(),
      catch: storeFailure("record scan"),
    }).pipe(
      Effect.map((rows) =>
        rows.filter(isRow).map((row) => this.options.fromRow(row))
      )
    );
  }
}

const QueryTypeSchema = Schema.Literal("SEARCH", "SUGGEST", "ADMIN", "ERROR");

const SearchQueryRow = Schema.Struct({
  id: Schema.Number,
  index_name: Schema.String,
  user_id: Schema.NullOr(Schema.String),
  search_terms: Schema.String,
  query: Schema.String,
  hits: Schema.String,
  total_hits: Schema.Number,
  reference: Schema.String,
  query_type: QueryTypeSchema,
  executed_at: Schema.String,
  duration: Schema.Number,
});

const CREATE_SEARCH_QUERY_TABLE = `
  CREATE TABLE IF NOT EXISTS search_query (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    index_name   TEXT    NOT NULL,
    user_id      TEXT,
    search_terms TEXT    NOT NULL DEFAULT '',
    query        TEXT    NOT NULL,
    hits         TEXT    NOT NULL,
    total_hits   INTEGER NOT NULL DEFAULT 0,
    reference    TEXT    NOT NULL DEFAULT '',
    query_type   TEXT    NOT NULL DEFAULT 'SEARCH',
    executed_at  TEXT    NOT NULL,
    duration     REAL    NOT NULL
  );
`;

/**
 * Query log stored in the `search_query` table.
 */
export class SqliteSearchQueryRepository implements SearchQueryRepositoryShape {
  constructor(private readonly db: Database.Database) {
    db.exec(CREATE_SEARCH_QUERY_TABLE);
  }

  save(query: SearchQuery) {
    return Effect.try({
      try: () =>
        this.db
          .prepare(
            `INSERT INTO search_query
               (index_name, user_id, search_terms, query, hits, total_hits, reference, query_type, executed_at, duration)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            query.index,
            query.user,
            query.searchTerms,
            JSON.stringify(query.query),
            JSON.stringify(query.hits),
            query.totalHits,
            query.reference,
            query.queryType,
            query.executedAt.toISOString(),
            query.duration
          ),
      catch: storeFailure("query log insert"),
    }).pipe(Effect.map((result) => query.withId(Number(result.lastInsertRowid))));
  }

  findById(id: number) {
    return Effect.gen(this, function* () {
      const row = yield* Effect.try({
        try: () =>
          this.db.prepare("SELECT * FROM search_query WHERE id = ?").get(id),
        catch: storeFailure("query log read"),
      });
      if (row === undefined) {
        return Option.none<SearchQuery>();
      }
      const decoded = yield* Schema.decodeUnknown(SearchQueryRow)(row).pipe(
        Effect.mapError(storeFailure("query log decode"))
      );
      const [query, hits] = yield* Effect.try({
        try: () =>
          [
            toJsonObject(JSON.parse(decoded.query)),
            toJsonValue(JSON.parse(decoded.hits)),
          ] as const,
        catch: storeFailure("query log decode"),
      });
      return Option.some(
        new SearchQuery({
          id: decoded.id,
          index: decoded.index_name,
          user: decoded.user_id,
          query,
          hits: Array.isArray(hits) ? hits : [],
          totalHits: decoded.total_hits,
          reference: decoded.reference,
          queryType: decoded.query_type,
          searchTerms: decoded.search_terms,
          executedAt: new Date(decoded.executed_at),
          duration: decoded.duration,
        })
      );
    });
  }
}

export const SqliteSearchQueryRepositoryLive = Layer.effect(
  SearchQueryRepository,
  Effect.map(SqliteDatabase, (db) => new SqliteSearchQueryRepository(db))
);
