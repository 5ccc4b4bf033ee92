import { randomUUID } from "node:crypto";
import {
  DocumentInput,
  MetadataFilter,
  ScoredRecord,
  StoredRecord,
} from "../../domain/types.js";
import { assertValidFilter, matchesFilter, VectorStore } from "../../domain/vectorStore.js";
import { cosineDistance } from "../../utils/vector.js";
import { Embeddings } from "../ai/types.js";

export interface IndexedRecord extends StoredRecord {
  embedding: number[];
}

export interface InMemoryVectorStoreSnapshot {
  collection: string;
  records: IndexedRecord[];
}

export class InMemoryVectorStore implements VectorStore {
  protected records = new Map<string, IndexedRecord>();

  constructor(
    readonly collection: string,
    private readonly embeddings: Embeddings,
  ) {}

  async addDocuments(documents: DocumentInput[]): Promise<string[]> {
    if (documents.length === 0) {
      return [];
    }

    const vectors = await this.embeddings.embedDocuments(
      documents.map((document) => document.text),
    );
    if (vectors.length !== documents.length) {
      throw new Error(
        `Embedding count mismatch (${vectors.length} vectors for ${documents.length} documents).`,
      );
    }

    const ids: string[] = [];
    documents.forEach((document, index) => {
      const id = randomUUID();
      this.records.set(id, {
        id,
        text: document.text,
        metadata: { ...document.metadata },
        embedding: vectors[index],
      });
      ids.push(id);
    });
    return ids;
  }

  async similaritySearchWithScore(
    query: string,
    k: number,
    filter?: MetadataFilter,
  ): Promise<ScoredRecord[]> {
    if (filter) {
      assertValidFilter(filter);
    }
    if (k <= 0) {
      return [];
    }

    const candidates = [...this.records.values()].filter((record) =>
      matchesFilter(record.metadata, filter),
    );
    if (candidates.length === 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.embedQuery(query);
    return candidates
      .map((record) => ({
        record: toStoredRecord(record),
        distance: cosineDistance(queryEmbedding, record.embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  async deleteByFilter(filter: MetadataFilter): Promise<number> {
    assertValidFilter(filter);
    let deleted = 0;
    for (const [id, record] of this.records) {
      if (matchesFilter(record.metadata, filter)) {
        this.records.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  async listByFilter(filter: MetadataFilter, limit?: number): Promise<StoredRecord[]> {
    assertValidFilter(filter);
    const max = limit && limit > 0 ? Math.floor(limit) : Number.POSITIVE_INFINITY;

    const rows: StoredRecord[] = [];
    for (const record of this.records.values()) {
      if (!matchesFilter(record.metadata, filter)) {
        continue;
      }
      rows.push(toStoredRecord(record));
      if (rows.length >= max) {
        break;
      }
    }
    return rows;
  }

  size(): number {
    return this.records.size;
  }

  protected exportSnapshot(): InMemoryVectorStoreSnapshot {
    return {
      collection: this.collection,
      records: [...this.records.values()].map((record) => ({
        ...record,
        metadata: { ...record.metadata },
        embedding: [...record.embedding],
      })),
    };
  }

  protected importSnapshot(snapshot: InMemoryVectorStoreSnapshot): void {
    this.records.clear();
    for (const record of snapshot.records) {
      this.records.set(record.id, {
        ...record,
        metadata: { ...record.metadata },
      });
    }
  }
}

function toStoredRecord(record: IndexedRecord): StoredRecord {
  return {
    id: record.id,
    text: record.text,
    metadata: { ...record.metadata },
  };
}
