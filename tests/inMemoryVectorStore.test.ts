import { describe, expect, it, vi } from "vitest";
import { InvalidFilterError } from "../src/domain/errors.js";
import { Embeddings } from "../src/infra/ai/types.js";
import { HashingEmbeddings } from "../src/infra/ai/hashingEmbeddings.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";

const COMPASS: Record<string, number[]> = {
  north: [1, 0],
  east: [0, 1],
  northeast: [1, 1],
};

function compassEmbeddings(): Embeddings {
  const lookup = (text: string) => COMPASS[text] ?? [0, 0];
  return {
    model: "compass",
    embedDocuments: vi.fn(async (texts: string[]) => texts.map(lookup)),
    embedQuery: vi.fn(async (text: string) => lookup(text)),
  };
}

describe("InMemoryVectorStore", () => {
  it("orders hits by ascending cosine distance", async () => {
    const store = new InMemoryVectorStore("docs", compassEmbeddings());
    await store.addDocuments([
      { text: "east", metadata: { source: "e", type: "chunk" } },
      { text: "north", metadata: { source: "n", type: "chunk" } },
      { text: "northeast", metadata: { source: "ne", type: "chunk" } },
    ]);

    const hits = await store.similaritySearchWithScore("north", 3);

    expect(hits.map((hit) => hit.record.text)).toEqual(["north", "northeast", "east"]);
    expect(hits[0].distance).toBeCloseTo(0, 10);
    expect(hits[1].distance).toBeCloseTo(1 - Math.SQRT1_2, 10);
    expect(hits[2].distance).toBeCloseTo(1, 10);
  });

  it("applies equality filters and the k limit", async () => {
    const store = new InMemoryVectorStore("docs", compassEmbeddings());
    await store.addDocuments([
      { text: "north", metadata: { source: "a", type: "summary" } },
      { text: "east", metadata: { source: "a", type: "chunk", chunk_index: 0 } },
      { text: "northeast", metadata: { source: "b", type: "chunk", chunk_index: 0 } },
    ]);

    const chunks = await store.similaritySearchWithScore("north", 5, { type: "chunk" });
    expect(chunks.map((hit) => hit.record.text)).toEqual(["northeast", "east"]);

    const scoped = await store.similaritySearchWithScore("north", 5, { type: "chunk", source: "a" });
    expect(scoped.map((hit) => hit.record.text)).toEqual(["east"]);

    const top = await store.similaritySearchWithScore("north", 1);
    expect(top.map((hit) => hit.record.text)).toEqual(["north"]);
  });

  it("does not embed the query when nothing matches the filter", async () => {
    const embeddings = compassEmbeddings();
    const store = new InMemoryVectorStore("docs", embeddings);
    await store.addDocuments([{ text: "north", metadata: { source: "a", type: "chunk" } }]);

    await expect(
      store.similaritySearchWithScore("north", 3, { source: "missing" }),
    ).resolves.toEqual([]);
    expect(embeddings.embedQuery).not.toHaveBeenCalled();
  });

  it("lists in insertion order and deletes by filter", async () => {
    const store = new InMemoryVectorStore("docs", compassEmbeddings());
    const ids = await store.addDocuments([
      { text: "north", metadata: { source: "a", type: "summary" } },
      { text: "east", metadata: { source: "a", type: "chunk" } },
      { text: "northeast", metadata: { source: "b", type: "chunk" } },
    ]);

    expect((await store.listByFilter({})).map((record) => record.id)).toEqual(ids);
    expect(await store.listByFilter({ type: "chunk" }, 1)).toEqual([
      { id: ids[1], text: "east", metadata: { source: "a", type: "chunk" } },
    ]);

    await expect(store.deleteByFilter({ source: "a" })).resolves.toBe(2);
    expect(store.size()).toBe(1);
    await expect(store.deleteByFilter({ source: "a" })).resolves.toBe(0);
  });

  it("rejects filters with empty keys", async () => {
    const store = new InMemoryVectorStore("docs", compassEmbeddings());

    await expect(store.listByFilter({ "": "x" })).rejects.toBeInstanceOf(InvalidFilterError);
    await expect(store.similaritySearchWithScore("north", 1, { " ": 1 })).rejects.toThrow(
      "Metadata filter keys must be non-empty.",
    );
  });

  it("rejects an embedder that returns the wrong number of vectors", async () => {
    const store = new InMemoryVectorStore("docs", {
      model: "broken",
      embedDocuments: async () => [],
      embedQuery: async () => [],
    });

    await expect(
      store.addDocuments([{ text: "north", metadata: { source: "a", type: "chunk" } }]),
    ).rejects.toThrow("Embedding count mismatch (0 vectors for 1 documents).");
  });
});

describe("HashingEmbeddings", () => {
  it("produces unit vectors of the configured dimension", async () => {
    const embeddings = new HashingEmbeddings(32);
    const [vector] = await embeddings.embedDocuments(["release notes for the api"]);

    expect(embeddings.model).toBe("hashing-32");
    expect(vector).toHaveLength(32);
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it("embeds identical text identically", async () => {
    const embeddings = new HashingEmbeddings(64);

    expect(await embeddings.embedQuery("deploy steps")).toEqual(
      await embeddings.embedQuery("Deploy   steps"),
    );
  });

  it("returns a zero vector for text without tokens", async () => {
    const embeddings = new HashingEmbeddings(4);

    expect(await embeddings.embedQuery("!!")).toEqual([0, 0, 0, 0]);
  });

  it("rejects a non-positive dimension", () => {
    expect(() => new HashingEmbeddings(0)).toThrow(
      "Hashing embedding dimension must be a positive integer, got 0.",
    );
  });
});
