import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const envSchema = z.object({
  VECTOR_STORE: z.enum(["memory", "persistent", "pgvector"]).default("memory"),
  DATABASE_URL: z.string().optional(),
  INDEX_DIR: z.string().default(".data"),
  MAX_INDEX_BYTES: z.coerce.number().int().positive().default(256 * 1024 * 1024),
  DOCUMENT_SCOPE: z
    .enum(["single_collection", "separate_collections"])
    .default("single_collection"),
  COLLECTION_NAME: z.string().min(1).default("hierarchical_documents"),
  SUMMARY_COLLECTION: z.string().min(1).default("doc_level_embeddings"),
  CHUNK_COLLECTION: z.string().min(1).default("chunk_level_embeddings"),
  EMBEDDING_PROVIDER: z.enum(["ollama", "openai", "hashing"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().optional(),
  CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  SUMMARY_MAX_CHARS: z.coerce.number().int().positive().default(4000),
  MAX_FILE_SIZE_MB: z.coerce.number().positive().default(50),
  RETRIEVAL_N_DOCS: z.coerce.number().int().positive().default(3),
  RETRIEVAL_N_CHUNKS_PER_DOC: z.coerce.number().int().positive().default(5),
  REPLACE_EXISTING: booleanFlag.default("true"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

const DEFAULT_VECTOR_DIMENSION = 768;

// Output sizes of the embedding models the providers default to or commonly serve.
const KNOWN_EMBEDDING_DIMENSIONS = new Map<string, number>([
  ["text-embedding-3-small", 1536],
  ["text-embedding-3-large", 3072],
  ["text-embedding-ada-002", 1536],
  ["nomic-embed-text", 768],
]);

export type VectorStoreKind = "memory" | "persistent" | "pgvector";
export type DocumentScopeKind = "single_collection" | "separate_collections";
export type EmbeddingProvider = "ollama" | "openai" | "hashing";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface AppConfig {
  vectorStore: VectorStoreKind;
  databaseUrl: string | null;
  indexDir: string;
  maxIndexBytes: number;
  documentScope: DocumentScopeKind;
  collectionName: string;
  summaryCollection: string;
  chunkCollection: string;
  embeddingProvider: EmbeddingProvider;
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  vectorDimension: number;
  chunkSize: number;
  chunkOverlap: number;
  summaryMaxChars: number;
  maxFileSizeBytes: number;
  retrievalNDocs: number;
  retrievalNChunksPerDoc: number;
  replaceExisting: boolean;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.VECTOR_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new Error("VECTOR_STORE=pgvector requires DATABASE_URL.");
  }
  if (parsed.EMBEDDING_PROVIDER === "openai" && !parsed.OPENAI_API_KEY) {
    throw new Error("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const embeddingModel =
    parsed.EMBEDDING_PROVIDER === "openai"
      ? parsed.OPENAI_EMBEDDING_MODEL
      : parsed.EMBEDDING_PROVIDER === "ollama"
        ? parsed.OLLAMA_EMBEDDING_MODEL
        : null;
  const vectorDimension = resolveVectorDimension(embeddingModel, parsed.VECTOR_DIMENSION);

  return {
    vectorStore: parsed.VECTOR_STORE,
    databaseUrl: parsed.DATABASE_URL ?? null,
    indexDir: parsed.INDEX_DIR,
    maxIndexBytes: parsed.MAX_INDEX_BYTES,
    documentScope: parsed.DOCUMENT_SCOPE,
    collectionName: parsed.COLLECTION_NAME,
    summaryCollection: parsed.SUMMARY_COLLECTION,
    chunkCollection: parsed.CHUNK_COLLECTION,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    vectorDimension,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    summaryMaxChars: parsed.SUMMARY_MAX_CHARS,
    maxFileSizeBytes: Math.floor(parsed.MAX_FILE_SIZE_MB * 1024 * 1024),
    retrievalNDocs: parsed.RETRIEVAL_N_DOCS,
    retrievalNChunksPerDoc: parsed.RETRIEVAL_N_CHUNKS_PER_DOC,
    replaceExisting: parsed.REPLACE_EXISTING,
    logLevel: parsed.LOG_LEVEL,
  };
}

/**
 * An explicit `VECTOR_DIMENSION` wins unless it contradicts the known output
 * size of the active embedding model.
 */
function resolveVectorDimension(model: string | null, configured: number | undefined): number {
  const known = model ? KNOWN_EMBEDDING_DIMENSIONS.get(model) : undefined;
  if (configured !== undefined && known !== undefined && configured !== known) {
    throw new Error(
      `VECTOR_DIMENSION (${configured}) does not match ${model}, which produces ${known}-dimensional vectors.`,
    );
  }
  return configured ?? known ?? DEFAULT_VECTOR_DIMENSION;
}
