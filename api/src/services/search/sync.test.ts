import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import type { EnvironmentShape } from "../environment";
import { Article, Draft, makeTestServices } from "../../testing/fixtures";
import { TransportFailure } from "./errors";
import type { IndexDefinitions } from "./mappings";
import { MemoryRecordSource } from "./ranking";
import { syncOnDelete, syncOnSave, updateIndex } from "./sync";

const published = [
  new Article(1, "Tides", 10),
  new Article(2, "Currents", 4),
  new Article(3, "Reefs", 7),
];

const setup = (
  environment: Partial<EnvironmentShape> = {},
  definitions?: IndexDefinitions
) =>
  makeTestServices({
    environment,
    definitions,
    models: [
      {
        entityType: "article",
        source: new MemoryRecordSource(published, (article) => article.id ?? 0),
      },
    ],
  });

describe("syncOnSave", () => {
  it("indexes a saved record", async () => {
    const { run, transport } = setup();
    expect(await run(syncOnSave(published[0]))).toEqual([
      { index: "articles", outcome: "indexed" },
    ]);
    expect(transport.index).toHaveBeenCalledWith(
      { title: "Tides", views: 10, checksum: "c0ffee" },
      1,
      "articles"
    );
  });

  it("sends a partial update when fields are named", async () => {
    const { run, transport } = setup({ updateStrategy: "PARTIAL" });
    const outcomes = await run(
      syncOnSave(new Article(2, "Currents", 5), { updateFields: ["views"] })
    );
    expect(outcomes).toEqual([{ index: "articles", outcome: "updated" }]);
    expect(transport.update).toHaveBeenCalledWith({ doc: { views: 5 } }, 2, "articles", {
      retryOnConflict: 0,
    });
  });

  it("removes a record that has left the search queryset", async () => {
    const { run, transport } = setup();
    expect(await run(syncOnSave(new Article(8, "Withdrawn")))).toEqual([
      { index: "articles", outcome: "deleted" },
    ]);
    expect(transport.delete).toHaveBeenCalledWith(8, "articles");
    expect(transport.index).not.toHaveBeenCalled();
  });

  it("syncs every index that maps the type", async () => {
    const { run, transport } = setup(
      {},
      {
        articles: { article: ["title", "views", "checksum"] },
        headlines: { article: ["title"] },
      }
    );
    expect(await run(syncOnSave(new Article(1, "Tides", 10)))).toEqual([
      { index: "articles", outcome: "indexed" },
      { index: "headlines", outcome: "indexed" },
    ]);
    expect(transport.index).toHaveBeenLastCalledWith({ title: "Tides" }, 1, "headlines");
  });

  it("does nothing when auto-sync is off", async () => {
    const { run, transport } = setup({ autoSync: false });
    expect(await run(syncOnSave(new Article(1, "Tides")))).toEqual([]);
    expect(transport.index).not.toHaveBeenCalled();
  });

  it("skips excluded entity types", async () => {
    const { run, transport } = setup({ neverAutoSync: ["article"] });
    expect(await run(syncOnSave(new Article(1, "Tides")))).toEqual([]);
    expect(transport.index).not.toHaveBeenCalled();
  });

  it("ignores types no index maps", async () => {
    const { run } = setup();
    expect(await run(syncOnSave(new Draft(1)))).toEqual([]);
  });
});

describe("syncOnDelete", () => {
  it("deletes the document from every index that maps the type", async () => {
    const { run, transport } = setup();
    expect(await run(syncOnDelete(new Article(2, "Currents")))).toEqual([
      { index: "articles", outcome: "deleted" },
    ]);
    expect(transport.delete).toHaveBeenCalledWith(2, "articles");
  });

  it("does nothing when auto-sync is off", async () => {
    const { run, transport } = setup({ autoSync: false });
    expect(await run(syncOnDelete(new Article(2, "Currents")))).toEqual([]);
    expect(transport.delete).not.toHaveBeenCalled();
  });
});

describe("updateIndex", () => {
  it("sends every record in bulk chunks", async () => {
    const { run, transport } = setup({ bulkChunkSize: 2 });
    expect(await run(updateIndex("articles"))).toEqual({
      index: "articles",
      documents: 3,
    });

    expect(transport.bulk).toHaveBeenCalledTimes(2);
    expect(transport.bulk.mock.calls.map(([actions]) => actions.map((action) => action._id))).toEqual([
      [1, 2],
      [3],
    ]);
    expect(transport.bulk.mock.calls[0]?.[0][0]).toEqual({
      _index: "articles",
      _op_type: "index",
      _id: 1,
      _source: { title: "Tides", views: 10, checksum: "c0ffee" },
    });
  });

  it("covers nothing for an index without models", async () => {
    const { run, transport } = setup();
    expect(await run(updateIndex("people"))).toEqual({ index: "people", documents: 0 });
    expect(transport.bulk).not.toHaveBeenCalled();
  });

  it("surfaces rejected bulk requests", async () => {
    const { failure, transport } = setup();
    transport.bulk.mockReturnValueOnce(
      Effect.fail(new TransportFailure(400, "mapper_parsing_exception"))
    );
    expect(await failure(updateIndex("articles"))).toMatchObject({
      _tag: "TransportFailure",
      status: 400,
    });
  });
});
