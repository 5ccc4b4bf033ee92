import { promises as fs } from "node:fs";
import path from "node:path";
import { DocumentInput, MetadataFilter } from "../../domain/types.js";
import { Embeddings } from "../ai/types.js";
import {
  IndexedRecord,
  InMemoryVectorStore,
  InMemoryVectorStoreSnapshot,
} from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;

interface PersistedVectorStore {
  format_version: number;
  saved_at: string;
  snapshot: InMemoryVectorStoreSnapshot;
}

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

/**
 * In-memory store mirrored to a JSON snapshot after every mutation.
 * Snapshot writes are serialized and replace the file through a temp file.
 */
export class PersistentInMemoryVectorStore extends InMemoryVectorStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    collection: string,
    embeddings: Embeddings,
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super(collection, embeddings);
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      const snapshot = parseSnapshotFromDisk(JSON.parse(raw) as unknown);
      if (snapshot.collection !== this.collection) {
        throw new Error(
          `Index file ${this.absolutePath} belongs to collection "${snapshot.collection}", expected "${this.collection}".`,
        );
      }
      this.importSnapshot(snapshot);
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async addDocuments(documents: DocumentInput[]): Promise<string[]> {
    await this.initialize();
    return this.mutate(() => super.addDocuments(documents));
  }

  async similaritySearchWithScore(query: string, k: number, filter?: MetadataFilter) {
    await this.initialize();
    return super.similaritySearchWithScore(query, k, filter);
  }

  async deleteByFilter(filter: MetadataFilter): Promise<number> {
    await this.initialize();
    return this.mutate(
      () => super.deleteByFilter(filter),
      (deleted) => deleted > 0,
    );
  }

  async listByFilter(filter: MetadataFilter, limit?: number) {
    await this.initialize();
    return super.listByFilter(filter, limit);
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(() => this.persistNow());
  }

  /**
   * Applies `change` and persists the result as one queued step. When the
   * snapshot cannot be written the in-memory records are restored, so a
   * failed call leaves nothing behind.
   */
  private mutate<T>(
    change: () => Promise<T>,
    shouldPersist: (result: T) => boolean = () => true,
  ): Promise<T> {
    const run = async (): Promise<T> => {
      const before = this.exportSnapshot();
      const result = await change();
      if (!shouldPersist(result)) {
        return result;
      }
      try {
        await this.persistNow();
      } catch (error) {
        this.importSnapshot(before);
        throw error;
      }
      return result;
    };
    const next = this.writeChain.then(run, run);
    // The caller sees the failure through `next`; the queue keeps going.
    this.writeChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task, task);
    this.writeChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedVectorStore = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await fs.rename(tempPath, this.absolutePath);
  }
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseSnapshotFromDisk(raw: unknown): InMemoryVectorStoreSnapshot {
  if (!raw || typeof raw !== "object") {
    throw new Error("Invalid index snapshot format.");
  }
  const v = raw as {
    format_version?: unknown;
    snapshot?: unknown;
  };
  if (v.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported index format version: ${String(v.format_version)}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  if (!isValidSnapshot(v.snapshot)) {
    throw new Error("Invalid index snapshot format.");
  }
  return v.snapshot;
}

function isValidSnapshot(value: unknown): value is InMemoryVectorStoreSnapshot {
  if (!value || typeof value !== "object") {
    return false;
  }
  const snapshot = value as {
    collection?: unknown;
    records?: unknown;
  };
  if (typeof snapshot.collection !== "string" || !Array.isArray(snapshot.records)) {
    return false;
  }
  return snapshot.records.every(isValidRecord);
}

function isValidRecord(value: unknown): value is IndexedRecord {
  if (!value || typeof value !== "object") {
    return false;
  }
  const record = value as {
    id?: unknown;
    text?: unknown;
    metadata?: unknown;
    embedding?: unknown;
  };
  return (
    typeof record.id === "string" &&
    typeof record.text === "string" &&
    typeof record.metadata === "object" &&
    record.metadata !== null &&
    Array.isArray(record.embedding) &&
    record.embedding.every((value) => typeof value === "number")
  );
}
