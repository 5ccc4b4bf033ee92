import path from "node:path";
import { AppConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import {
  DocumentScope,
  SeparateCollectionsScope,
  SingleCollectionScope,
} from "../../pipelines/documentScope.js";
import { Embeddings } from "../ai/types.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PersistentInMemoryVectorStore } from "./persistentInMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export interface VectorStoreBootstrapResult {
  scope: DocumentScope;
  close: () => Promise<void>;
}

export async function createVectorStores(
  config: AppConfig,
  embeddings: Embeddings,
): Promise<VectorStoreBootstrapResult> {
  const collections =
    config.documentScope === "single_collection"
      ? [config.collectionName]
      : [config.summaryCollection, config.chunkCollection];

  const { stores, close } = await openStores(config, embeddings, collections);
  const scope =
    stores.length === 1
      ? new SingleCollectionScope(stores[0])
      : new SeparateCollectionsScope(stores[0], stores[1]);

  return { scope, close };
}

async function openStores(
  config: AppConfig,
  embeddings: Embeddings,
  collections: string[],
): Promise<{ stores: VectorStore[]; close: () => Promise<void> }> {
  if (config.vectorStore === "memory") {
    return {
      stores: collections.map((name) => new InMemoryVectorStore(name, embeddings)),
      close: async () => {},
    };
  }

  if (config.vectorStore === "persistent") {
    const stores = collections.map(
      (name) =>
        new PersistentInMemoryVectorStore(
          name,
          embeddings,
          path.join(config.indexDir, `${name}.json`),
          { maxBytes: config.maxIndexBytes },
        ),
    );
    for (const store of stores) {
      await store.initialize();
    }
    return {
      stores,
      close: async () => {
        for (const store of stores) {
          await store.close();
        }
      },
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when VECTOR_STORE=pgvector.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const stores = collections.map(
    (name) => new PgVectorStore(pool, name, embeddings, config.vectorDimension),
  );
  for (const store of stores) {
    await store.initialize();
  }

  return {
    stores,
    close: async () => {
      await pool.end();
    },
  };
}
