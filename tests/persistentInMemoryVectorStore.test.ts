import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HashingEmbeddings } from "../src/infra/ai/hashingEmbeddings.js";
import { PersistentInMemoryVectorStore } from "../src/infra/store/persistentInMemoryVectorStore.js";

describe("PersistentInMemoryVectorStore", () => {
  let tmpDir: string;
  let indexFile: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "persistent-store-"));
    indexFile = path.join(tmpDir, "nested", "docs.json");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function openStore(collection = "docs", maxBytes = 1_000_000): PersistentInMemoryVectorStore {
    return new PersistentInMemoryVectorStore(
      collection,
      new HashingEmbeddings(16),
      indexFile,
      { maxBytes },
    );
  }

  it("restores records after restart", async () => {
    const first = openStore();
    await first.initialize();
    await first.addDocuments([
      {
        text: "Weekly report lists users and projects.",
        metadata: { source: "weekly.txt", type: "chunk", chunk_index: 0 },
      },
    ]);
    await first.close();

    const second = openStore();
    await second.initialize();

    const records = await second.listByFilter({ source: "weekly.txt" });
    expect(records).toHaveLength(1);
    expect(records[0].metadata).toEqual({ source: "weekly.txt", type: "chunk", chunk_index: 0 });

    const hits = await second.similaritySearchWithScore("weekly report", 1);
    expect(hits.map((hit) => hit.record.id)).toEqual([records[0].id]);
  });

  it("persists deletions", async () => {
    const first = openStore();
    await first.addDocuments([
      { text: "alpha", metadata: { source: "a.txt", type: "summary" } },
      { text: "beta", metadata: { source: "b.txt", type: "summary" } },
    ]);
    await expect(first.deleteByFilter({ source: "a.txt" })).resolves.toBe(1);

    const second = openStore();
    const remaining = await second.listByFilter({});
    expect(remaining.map((record) => record.text)).toEqual(["beta"]);
  });

  it("enforces the maximum snapshot size", async () => {
    const store = openStore("docs", 120);
    await store.initialize();

    await expect(
      store.addDocuments([{ text: "A".repeat(200), metadata: { source: "big.txt", type: "chunk" } }]),
    ).rejects.toThrow("exceeds size limit");
    expect(await store.listByFilter({})).toEqual([]);
    expect(store.size()).toBe(0);
  });

  it("restores deleted records when the snapshot cannot be written", async () => {
    const store = openStore();
    await store.addDocuments([
      { text: "alpha", metadata: { source: "a.txt", type: "summary" } },
      { text: "beta", metadata: { source: "b.txt", type: "summary" } },
    ]);
    vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("disk full"));

    await expect(store.deleteByFilter({ source: "a.txt" })).rejects.toThrow("disk full");

    expect((await store.listByFilter({})).map((record) => record.text)).toEqual(["alpha", "beta"]);
    await expect(store.deleteByFilter({ source: "a.txt" })).resolves.toBe(1);
  });

  it("refuses a snapshot written for another collection", async () => {
    const first = openStore("summaries");
    await first.addDocuments([{ text: "alpha", metadata: { source: "a.txt", type: "summary" } }]);

    await expect(openStore("chunks").initialize()).rejects.toThrow(
      `belongs to collection "summaries", expected "chunks"`,
    );
  });

});
