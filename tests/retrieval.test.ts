import { describe, expect, it, vi } from "vitest";
import { InvalidRequestError, RetrievalError } from "../src/domain/errors.js";
import { ChunkRecord, ScoredRecord, StoredRecord } from "../src/domain/types.js";
import { HashingEmbeddings } from "../src/infra/ai/hashingEmbeddings.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { DocumentScope, SingleCollectionScope } from "../src/pipelines/documentScope.js";
import { HierarchicalRetriever } from "../src/pipelines/retrieval.js";

function summary(id: string, source: string | undefined, distance: number): ScoredRecord {
  const record: StoredRecord = {
    id,
    text: `summary ${id}`,
    metadata: source === undefined ? { type: "summary" } : { type: "summary", source },
  };
  return { record, distance };
}

function chunk(id: string, source: string, index: number, distance: number): ScoredRecord {
  return {
    record: { id, text: `chunk ${id}`, metadata: { type: "chunk", source, chunk_index: index } },
    distance,
  };
}

function scriptedScope(
  summaries: ScoredRecord[],
  chunksBySource: Record<string, ScoredRecord[]>,
) {
  const searchSummaries = vi.fn(async (_query: string, _k: number) => summaries);
  const searchChunks = vi.fn(
    async (_query: string, sourceId: string, _k: number) => chunksBySource[sourceId] ?? [],
  );
  const scope: DocumentScope = {
    kind: "single_collection",
    collection: "docs",
    searchSummaries,
    searchChunks,
    writeSummary: vi.fn(async () => {}),
    writeChunks: vi.fn(async () => {}),
    deleteSource: vi.fn(async () => 0),
    listSummaries: vi.fn(async () => []),
    listChunks: vi.fn(async () => []),
  };
  return { scope, searchSummaries, searchChunks };
}

describe("HierarchicalRetriever", () => {
  it("returns nothing and skips the fine stage when no summaries match", async () => {
    const { scope, searchChunks } = scriptedScope([], {});
    const retriever = new HierarchicalRetriever(scope);

    await expect(retriever.retrieve("anything")).resolves.toEqual([]);
    expect(searchChunks).not.toHaveBeenCalled();
  });

  it("groups chunks by document in summary order without re-sorting", async () => {
    const { scope } = scriptedScope([summary("sa", "a.txt", 0.1), summary("sb", "b.txt", 0.3)], {
      "a.txt": [chunk("a1", "a.txt", 0, 0.2), chunk("a2", "a.txt", 3, 0.5)],
      "b.txt": [chunk("b1", "b.txt", 1, 0.05)],
    });
    const retriever = new HierarchicalRetriever(scope, { nDocs: 2, nChunksPerDoc: 2 });

    const results = await retriever.retrieve("deploy");

    expect(
      results.map(({ record, distance, parentSummaryScore }) => ({
        id: record.id,
        distance,
        parentSummaryScore,
      })),
    ).toEqual([
      { id: "a1", distance: 0.2, parentSummaryScore: 0.1 },
      { id: "a2", distance: 0.5, parentSummaryScore: 0.1 },
      { id: "b1", distance: 0.05, parentSummaryScore: 0.3 },
    ]);
  });

  it("passes the configured counts to each stage", async () => {
    const { scope, searchSummaries, searchChunks } = scriptedScope(
      [summary("sa", "a.txt", 0.1)],
      { "a.txt": [chunk("a1", "a.txt", 0, 0.2)] },
    );
    const retriever = new HierarchicalRetriever(scope, { nDocs: 4, nChunksPerDoc: 6 });

    await retriever.retrieve("deploy");
    await retriever.retrieve("deploy", 1, 2);

    expect(searchSummaries.mock.calls).toEqual([
      ["deploy", 4],
      ["deploy", 1],
    ]);
    expect(searchChunks.mock.calls).toEqual([
      ["deploy", "a.txt", 6],
      ["deploy", "a.txt", 2],
    ]);
  });

  it("skips summaries without a source id", async () => {
    const { scope, searchChunks } = scriptedScope(
      [summary("orphan", undefined, 0.05), summary("sb", "b.txt", 0.2)],
      { "b.txt": [chunk("b1", "b.txt", 0, 0.3)] },
    );
    const retriever = new HierarchicalRetriever(scope, { nDocs: 2, nChunksPerDoc: 2 });

    const results = await retriever.retrieve("query");

    expect(searchChunks).toHaveBeenCalledTimes(1);
    expect(searchChunks).toHaveBeenCalledWith("query", "b.txt", 2);
    expect(results.map((result) => result.record.id)).toEqual(["b1"]);
  });

  it("expands each source once even when several summaries point at it", async () => {
    const { scope, searchChunks } = scriptedScope(
      [summary("s1", "a.txt", 0.1), summary("s2", "a.txt", 0.2)],
      { "a.txt": [chunk("a1", "a.txt", 0, 0.3)] },
    );
    const retriever = new HierarchicalRetriever(scope, { nDocs: 2, nChunksPerDoc: 2 });

    const results = await retriever.retrieve("query");

    expect(searchChunks).toHaveBeenCalledTimes(1);
    expect(results).toHaveLength(1);
  });

  it("never returns more than nDocs * nChunksPerDoc results", async () => {
    const { scope } = scriptedScope(
      [summary("sa", "a.txt", 0.1), summary("sb", "b.txt", 0.2), summary("sc", "c.txt", 0.3)],
      {
        "a.txt": [chunk("a1", "a.txt", 0, 0.1), chunk("a2", "a.txt", 1, 0.2), chunk("a3", "a.txt", 2, 0.3)],
        "b.txt": [chunk("b1", "b.txt", 0, 0.1), chunk("b2", "b.txt", 1, 0.2), chunk("b3", "b.txt", 2, 0.3)],
        "c.txt": [chunk("c1", "c.txt", 0, 0.1)],
      },
    );
    const retriever = new HierarchicalRetriever(scope);

    const results = await retriever.retrieve("query", 2, 2);

    expect(results.map((result) => result.record.id)).toEqual(["a1", "a2", "b1", "b2"]);
  });

  it("wraps a coarse-stage failure", async () => {
    const { scope, searchSummaries } = scriptedScope([], {});
    searchSummaries.mockRejectedValueOnce(new Error("index offline"));
    const retriever = new HierarchicalRetriever(scope);

    const error = await retriever.retrieve("query").catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      stage: "coarse",
      details: { stage: "coarse", sourceId: null },
      message: "Vector store search failed during coarse stage: index offline",
    });
  });

  it("wraps a fine-stage failure with the source it was expanding", async () => {
    const { scope, searchChunks } = scriptedScope([summary("sb", "b.txt", 0.2)], {});
    searchChunks.mockRejectedValueOnce(new Error("timeout"));
    const retriever = new HierarchicalRetriever(scope);

    await expect(retriever.retrieve("query")).rejects.toMatchObject({
      code: "RetrievalFailed",
      details: { stage: "fine", sourceId: "b.txt" },
    });
  });

  it("rejects empty queries and non-positive counts", async () => {
    const { scope } = scriptedScope([], {});
    const retriever = new HierarchicalRetriever(scope);

    await expect(retriever.retrieve("   ")).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(retriever.retrieve("query", 0, 2)).rejects.toThrow(
      "nDocs must be a positive integer, got 0.",
    );
    expect(() => new HierarchicalRetriever(scope, { nChunksPerDoc: 1.5 })).toThrow(
      InvalidRequestError,
    );
  });

  it("returns only chunks of the best document on a real index", async () => {
    const scope = new SingleCollectionScope(
      new InMemoryVectorStore("docs", new HashingEmbeddings(256)),
    );
    await scope.writeSummary({
      text: "Solar panels convert sunlight into electricity for homes.",
      metadata: { source: "solar.txt", type: "summary" },
    });
    await scope.writeChunks(
      [
        "Solar panels are mounted facing the sun.",
        "Inverters turn panel output into household current.",
        "Sunlight intensity changes with the seasons.",
        "Panels need occasional cleaning.",
      ].map((text, index): ChunkRecord => ({
        text,
        metadata: { source: "solar.txt", type: "chunk", chunk_index: index },
      })),
    );
    await scope.writeSummary({
      text: "Baking sourdough bread with flour, water and a starter.",
      metadata: { source: "bread.txt", type: "summary" },
    });
    await scope.writeChunks(
      [
        "Feed the starter the night before.",
        "Mix flour and water, then rest the dough.",
        "Fold the dough every half hour.",
        "Bake in a hot covered pot.",
      ].map((text, index): ChunkRecord => ({
        text,
        metadata: { source: "bread.txt", type: "chunk", chunk_index: index },
      })),
    );
    const retriever = new HierarchicalRetriever(scope);

    const results = await retriever.retrieve("solar panels sunlight", 1, 2);

    expect(results).toHaveLength(2);
    expect(results.map((result) => result.record.metadata.source)).toEqual([
      "solar.txt",
      "solar.txt",
    ]);
    expect(results.every((result) => result.record.metadata.type === "chunk")).toBe(true);
    expect(results[0].parentSummaryScore).toBe(results[1].parentSummaryScore);
    expect(results[0].distance).toBeLessThanOrEqual(results[1].distance);
  });

  it("returns bare records from retrieveSimple", async () => {
    const { scope } = scriptedScope([summary("sa", "a.txt", 0.1)], {
      "a.txt": [chunk("a1", "a.txt", 0, 0.2)],
    });
    const retriever = new HierarchicalRetriever(scope);

    await expect(retriever.retrieveSimple("query")).resolves.toEqual([
      { id: "a1", text: "chunk a1", metadata: { type: "chunk", source: "a.txt", chunk_index: 0 } },
    ]);
  });
});
