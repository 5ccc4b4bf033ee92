import type { Pool } from "pg";
import {
  DocumentInput,
  MetadataFilter,
  ScoredRecord,
  StoredRecord,
} from "../../domain/types.js";
import { assertValidFilter, VectorStore } from "../../domain/vectorStore.js";
import { Embeddings } from "../ai/types.js";

interface PgRecordRow {
  id: string;
  content: string;
  metadata: StoredRecord["metadata"];
}

interface PgScoredRow extends PgRecordRow {
  distance: number | string;
}

/**
 * pgvector-backed store. All collections share one table; metadata lives in
 * JSONB and equality filters become a `@>` containment test.
 */
export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    readonly collection: string,
    private readonly embeddings: Embeddings,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS vector_records (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        seq BIGSERIAL,
        collection TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_vector_records_collection ON vector_records(collection)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_vector_records_metadata ON vector_records USING GIN (metadata jsonb_path_ops)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_vector_records_embedding
      ON vector_records USING hnsw (embedding vector_cosine_ops)
    `);

    this.initialized = true;
  }

  async addDocuments(documents: DocumentInput[]): Promise<string[]> {
    await this.initialize();
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

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const ids: string[] = [];
      for (let i = 0; i < documents.length; i += 1) {
        const result = await client.query<{ id: string }>(
          `
            INSERT INTO vector_records (collection, content, metadata, embedding)
            VALUES ($1, $2, $3::jsonb, $4::vector)
            RETURNING id
          `,
          [
            this.collection,
            documents[i].text,
            JSON.stringify(documents[i].metadata),
            toVectorLiteral(vectors[i]),
          ],
        );
        ids.push(result.rows[0].id);
      }
      await client.query("COMMIT");
      return ids;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async similaritySearchWithScore(
    query: string,
    k: number,
    filter: MetadataFilter = {},
  ): Promise<ScoredRecord[]> {
    assertValidFilter(filter);
    await this.initialize();
    if (k <= 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.embedQuery(query);
    const result = await this.pool.query<PgScoredRow>(
      `
        SELECT id, content, metadata, (embedding <=> $1::vector) AS distance
        FROM vector_records
        WHERE collection = $2 AND metadata @> $3::jsonb
        ORDER BY embedding <=> $1::vector
        LIMIT $4
      `,
      [toVectorLiteral(queryEmbedding), this.collection, JSON.stringify(filter), Math.floor(k)],
    );

    return result.rows.map((row) => ({
      record: toStoredRecord(row),
      distance: Number(row.distance),
    }));
  }

  async deleteByFilter(filter: MetadataFilter): Promise<number> {
    assertValidFilter(filter);
    await this.initialize();
    const result = await this.pool.query(
      `DELETE FROM vector_records WHERE collection = $1 AND metadata @> $2::jsonb`,
      [this.collection, JSON.stringify(filter)],
    );
    return result.rowCount ?? 0;
  }

  async listByFilter(filter: MetadataFilter, limit?: number): Promise<StoredRecord[]> {
    assertValidFilter(filter);
    await this.initialize();
    const result = await this.pool.query<PgRecordRow>(
      `
        SELECT id, content, metadata
        FROM vector_records
        WHERE collection = $1 AND metadata @> $2::jsonb
        ORDER BY seq ASC
        LIMIT $3
      `,
      [
        this.collection,
        JSON.stringify(filter),
        limit && limit > 0 ? Math.floor(limit) : null,
      ],
    );
    return result.rows.map(toStoredRecord);
  }
}

function toStoredRecord(row: PgRecordRow): StoredRecord {
  return {
    id: row.id,
    text: row.content,
    metadata: row.metadata,
  };
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
