import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      vectorStore: "memory",
      databaseUrl: null,
      indexDir: ".data",
      documentScope: "single_collection",
      collectionName: "hierarchical_documents",
      embeddingProvider: "ollama",
      vectorDimension: 768,
      chunkSize: 500,
      chunkOverlap: 50,
      summaryMaxChars: 4000,
      maxFileSizeBytes: 50 * 1024 * 1024,
      retrievalNDocs: 3,
      retrievalNChunksPerDoc: 5,
      replaceExisting: true,
      logLevel: "info",
    });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadConfig({
      DOCUMENT_SCOPE: "separate_collections",
      EMBEDDING_PROVIDER: "hashing",
      VECTOR_DIMENSION: "256",
      CHUNK_SIZE: "800",
      CHUNK_OVERLAP: "0",
      MAX_FILE_SIZE_MB: "1.5",
      REPLACE_EXISTING: "false",
    });

    expect(config.documentScope).toBe("separate_collections");
    expect(config.embeddingProvider).toBe("hashing");
    expect(config.vectorDimension).toBe(256);
    expect(config.chunkSize).toBe(800);
    expect(config.chunkOverlap).toBe(0);
    expect(config.maxFileSizeBytes).toBe(1572864);
    expect(config.replaceExisting).toBe(false);
  });

  it("requires DATABASE_URL for pgvector", () => {
    expect(() => loadConfig({ VECTOR_STORE: "pgvector" })).toThrow(
      "VECTOR_STORE=pgvector requires DATABASE_URL.",
    );
  });

  it("requires an API key for the openai provider", () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "openai" })).toThrow(
      "EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.",
    );
    expect(
      loadConfig({ EMBEDDING_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" }).openaiApiKey,
    ).toBe("test-secret");
  });

  it("sizes vectors for the active embedding model", () => {
    expect(
      loadConfig({ EMBEDDING_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" }).vectorDimension,
    ).toBe(1536);
    expect(
      loadConfig({
        EMBEDDING_PROVIDER: "openai",
        OPENAI_API_KEY: "test-secret",
        OPENAI_EMBEDDING_MODEL: "text-embedding-3-large",
      }).vectorDimension,
    ).toBe(3072);
    expect(loadConfig({ OLLAMA_EMBEDDING_MODEL: "custom-embedder" }).vectorDimension).toBe(768);
    expect(
      loadConfig({ OLLAMA_EMBEDDING_MODEL: "custom-embedder", VECTOR_DIMENSION: "1024" })
        .vectorDimension,
    ).toBe(1024);
  });

  it("rejects a dimension that contradicts the embedding model", () => {
    expect(() =>
      loadConfig({
        EMBEDDING_PROVIDER: "openai",
        OPENAI_API_KEY: "test-secret",
        VECTOR_DIMENSION: "768",
      }),
    ).toThrow(
      "VECTOR_DIMENSION (768) does not match text-embedding-3-small, which produces 1536-dimensional vectors.",
    );
    expect(() => loadConfig({ VECTOR_DIMENSION: "1536" })).toThrow(
      "VECTOR_DIMENSION (1536) does not match nomic-embed-text, which produces 768-dimensional vectors.",
    );
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100).",
    );
  });

  it("rejects unknown enum values", () => {
    expect(() => loadConfig({ DOCUMENT_SCOPE: "sharded" })).toThrow(ZodError);
  });
});
