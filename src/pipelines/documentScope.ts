import { DocumentScopeKind } from "../config/env.js";
import {
  ChunkRecord,
  ScoredRecord,
  StoredRecord,
  SummaryRecord,
} from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";

/**
 * Layout of summaries and chunks in the vector index. Ingestion writes
 * through it and retrieval reads through it.
 */
export interface DocumentScope {
  readonly kind: DocumentScopeKind;
  readonly collection: string;
  searchSummaries(query: string, k: number): Promise<ScoredRecord[]>;
  searchChunks(query: string, sourceId: string, k: number): Promise<ScoredRecord[]>;
  writeSummary(record: SummaryRecord): Promise<void>;
  writeChunks(records: ChunkRecord[]): Promise<void>;
  deleteSource(sourceId: string): Promise<number>;
  listSummaries(sourceId?: string): Promise<StoredRecord[]>;
  listChunks(sourceId?: string): Promise<StoredRecord[]>;
}

/** Summaries and chunks share one collection and are told apart by `type`. */
export class SingleCollectionScope implements DocumentScope {
  readonly kind = "single_collection";

  constructor(private readonly store: VectorStore) {}

  get collection(): string {
    return this.store.collection;
  }

  searchSummaries(query: string, k: number): Promise<ScoredRecord[]> {
    return this.store.similaritySearchWithScore(query, k, { type: "summary" });
  }

  searchChunks(query: string, sourceId: string, k: number): Promise<ScoredRecord[]> {
    return this.store.similaritySearchWithScore(query, k, {
      source: sourceId,
      type: "chunk",
    });
  }

  async writeSummary(record: SummaryRecord): Promise<void> {
    await this.store.addDocuments([record]);
  }

  async writeChunks(records: ChunkRecord[]): Promise<void> {
    await this.store.addDocuments(records);
  }

  deleteSource(sourceId: string): Promise<number> {
    return this.store.deleteByFilter({ source: sourceId });
  }

  listSummaries(sourceId?: string): Promise<StoredRecord[]> {
    return this.store.listByFilter(
      sourceId === undefined ? { type: "summary" } : { type: "summary", source: sourceId },
    );
  }

  listChunks(sourceId?: string): Promise<StoredRecord[]> {
    return this.store.listByFilter(
      sourceId === undefined ? { type: "chunk" } : { type: "chunk", source: sourceId },
    );
  }
}

/**
 * Summaries in one collection, chunks in another. Records still carry their
 * `type` tag so either collection can be inspected on its own.
 */
export class SeparateCollectionsScope implements DocumentScope {
  readonly kind = "separate_collections";

  constructor(
    private readonly summaryStore: VectorStore,
    private readonly chunkStore: VectorStore,
  ) {}

  get collection(): string {
    return `${this.summaryStore.collection}+${this.chunkStore.collection}`;
  }

  searchSummaries(query: string, k: number): Promise<ScoredRecord[]> {
    return this.summaryStore.similaritySearchWithScore(query, k);
  }

  searchChunks(query: string, sourceId: string, k: number): Promise<ScoredRecord[]> {
    return this.chunkStore.similaritySearchWithScore(query, k, { source: sourceId });
  }

  async writeSummary(record: SummaryRecord): Promise<void> {
    await this.summaryStore.addDocuments([record]);
  }

  async writeChunks(records: ChunkRecord[]): Promise<void> {
    await this.chunkStore.addDocuments(records);
  }

  async deleteSource(sourceId: string): Promise<number> {
    const summaries = await this.summaryStore.deleteByFilter({ source: sourceId });
    const chunks = await this.chunkStore.deleteByFilter({ source: sourceId });
    return summaries + chunks;
  }

  listSummaries(sourceId?: string): Promise<StoredRecord[]> {
    return this.summaryStore.listByFilter(sourceId === undefined ? {} : { source: sourceId });
  }

  listChunks(sourceId?: string): Promise<StoredRecord[]> {
    return this.chunkStore.listByFilter(sourceId === undefined ? {} : { source: sourceId });
  }
}
