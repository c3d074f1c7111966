import { Effect, Option, TestContext } from "effect";
import { describe, expect, it } from "vitest";
import { makeTestServices } from "../../testing/fixtures";
import { TransportFailure } from "./errors";
import {
  SearchQuery,
  SearchQueryRepository,
  executeSearch,
  extractSearchTerms,
  recordQuery,
  toSearchQuery,
} from "./query-log";

describe("extractSearchTerms", () => {
  it("reads a field-keyed match clause", () => {
    expect(extractSearchTerms({ query: { match: { title: "tide" } } })).toBe("tide");
  });

  it("reads the query of a multi_match clause", () => {
    expect(
      extractSearchTerms({
        query: { multi_match: { query: "tide pools", fields: ["title", "body"] } },
      })
    ).toBe("tide pools");
  });

  it("reads the expanded form of a match clause", () => {
    expect(
      extractSearchTerms({ query: { match: { title: { query: "surf", operator: "and" } } } })
    ).toBe("surf");
  });

  it("is empty for queries without text clauses", () => {
    expect(extractSearchTerms({ query: { term: { status: "published" } } })).toBe("");
    expect(extractSearchTerms({})).toBe("");
  });
});

describe("SearchQuery", () => {
  const hits = [
    { id: 4, score: 2.5 },
    { id: 9, score: null },
    { id: 2, score: 1 },
  ];

  it("derives the page from the requested slice", () => {
    const query = new SearchQuery({ query: { from: 10, size: 5 }, hits });
    expect(query.pageSlice).toEqual([10, 5]);
    expect([query.pageSize, query.pageFrom, query.pageTo]).toEqual([3, 11, 13]);
  });

  it("uses the engine defaults when the body gives no slice", () => {
    const query = new SearchQuery({ query: { query: { match_all: {} } }, hits });
    expect(query.pageSlice).toEqual([0, 10]);
    expect([query.pageSize, query.pageFrom, query.pageTo]).toEqual([3, 1, 3]);
  });

  it("has no slice for an empty body", () => {
    const query = new SearchQuery({ hits });
    expect(query.pageSlice).toBeNull();
    expect([query.pageSize, query.pageFrom, query.pageTo]).toEqual([3, 1, 3]);
  });

  it("caps the page size at the requested size", () => {
    const query = new SearchQuery({ query: { size: 2 }, hits });
    expect([query.pageSize, query.pageFrom, query.pageTo]).toEqual([2, 1, 2]);
  });

  it("reports zeros when there are no hits", () => {
    const query = new SearchQuery({ query: { from: 20, size: 10 } });
    expect([query.pageSize, query.pageFrom, query.pageTo]).toEqual([0, 0, 0]);
    expect([query.maxScore, query.minScore]).toEqual([0, 0]);
  });

  it("treats a missing score as 0", () => {
    const query = new SearchQuery({ hits });
    expect(query.maxScore).toBe(2.5);
    expect(query.minScore).toBe(0);
  });

  it("lists hit ids", () => {
    expect(new SearchQuery({ hits }).objectIds).toEqual(new Set([4, 9, 2]));
  });

  it("ranks hits in order, keeping the first position of a repeated id", () => {
    const query = new SearchQuery({
      hits: [
        { id: "a", score: 3 },
        { id: "b", score: null },
        { id: "a", score: 1 },
        { id: "c", score: 0.5 },
      ],
    });
    expect(query.ranking).toEqual([
      { id: "a", score: 3, rank: 0 },
      { id: "b", score: 0, rank: 1 },
      { id: "c", score: 0.5, rank: 3 },
    ]);
  });

  it("derives search terms unless given", () => {
    const body = { query: { match: { title: "tide" } } };
    expect(new SearchQuery({ query: body }).searchTerms).toBe("tide");
    expect(new SearchQuery({ query: body, searchTerms: "custom" }).searchTerms).toBe(
      "custom"
    );
  });
});

describe("toSearchQuery", () => {
  it("coerces values that are not JSON", () => {
    const query = toSearchQuery({
      index: "articles",
      query: { range: { published: { gte: new Date("2024-01-01T00:00:00.000Z") } } },
      hits: [{ id: 1, score: 1n }],
      totalHits: 1,
      executedAt: new Date(0),
      duration: 0.5,
    });
    expect(query.query).toEqual({
      range: { published: { gte: "2024-01-01T00:00:00.000Z" } },
    });
    expect(query.hits).toEqual([{ id: 1, score: "1" }]);
  });
});

describe("recordQuery", () => {
  it("saves the record and returns it with its id", async () => {
    const { run, queries } = makeTestServices();
    const saved = await run(
      recordQuery({
        index: "articles",
        user: "user-1",
        query: { query: { match: { title: "tide" } } },
        hits: [{ id: 1, score: 1.2 }],
        totalHits: 1,
        reference: "homepage",
        executedAt: new Date(0),
        duration: 0.25,
      })
    );
    expect(saved.id).toBe(1);
    expect(saved.searchTerms).toBe("tide");
    expect(queries.saved).toEqual([saved]);

    const found = await run(
      Effect.flatMap(SearchQueryRepository, (repository) => repository.findById(1))
    );
    expect(Option.getOrNull(found)?.reference).toBe("homepage");
  });
});

describe("executeSearch", () => {
  const body = { query: { match: { title: "tide" } }, size: 5 };

  it("runs the query and logs it", async () => {
    const { run, transport } = makeTestServices();
    transport.search.mockReturnValueOnce(
      Effect.succeed({
        hits: [
          { id: "7", score: 2, index: "articles" },
          { id: "3", score: 1.5, index: "articles" },
        ],
        total: 12,
        tookMs: 12,
      })
    );

    const query = await run(
      executeSearch({ index: "articles", query: body, user: "user-1" }).pipe(
        Effect.provide(TestContext.TestContext)
      )
    );

    expect(transport.search).toHaveBeenCalledWith("articles", body);
    expect(query.id).toBe(1);
    expect(query.user).toBe("user-1");
    expect(query.searchTerms).toBe("tide");
    expect(query.totalHits).toBe(12);
    expect(query.duration).toBe(0.012);
    expect(query.executedAt).toEqual(new Date(0));
    expect(query.hits).toEqual([
      { id: "7", score: 2, index: "articles" },
      { id: "3", score: 1.5, index: "articles" },
    ]);
    expect([query.pageSize, query.pageFrom, query.pageTo]).toEqual([2, 1, 2]);
  });

  it("returns an unsaved record when asked not to save", async () => {
    const { run, queries } = makeTestServices();
    const query = await run(
      executeSearch({ index: "articles", query: body, save: false })
    );
    expect(query.id).toBeNull();
    expect(queries.saved).toHaveLength(0);
  });

  it("logs nothing when the engine fails", async () => {
    const { failure, transport, queries } = makeTestServices();
    transport.search.mockReturnValueOnce(
      Effect.fail(new TransportFailure(400, "parsing_exception"))
    );

    expect(
      await failure(executeSearch({ index: "articles", query: body }))
    ).toBeInstanceOf(TransportFailure);
    expect(queries.saved).toHaveLength(0);
  });
});
