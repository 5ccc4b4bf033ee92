import { InvalidFilterError } from "./errors.js";
import {
  DocumentInput,
  MetadataFilter,
  ScoredRecord,
  StoredRecord,
} from "./types.js";

/**
 * Capability the core consumes from the vector index. Implementations embed
 * `text` themselves; callers never hand over vectors.
 */
export interface VectorStore {
  readonly collection: string;
  addDocuments(records: DocumentInput[]): Promise<string[]>;
  /** Results are ordered by ascending distance (lower is closer). */
  similaritySearchWithScore(
    query: string,
    k: number,
    filter?: MetadataFilter,
  ): Promise<ScoredRecord[]>;
  deleteByFilter(filter: MetadataFilter): Promise<number>;
  listByFilter(filter: MetadataFilter, limit?: number): Promise<StoredRecord[]>;
}

export function assertValidFilter(filter: MetadataFilter): void {
  for (const [key, value] of Object.entries(filter)) {
    if (!key.trim()) {
      throw new InvalidFilterError("Metadata filter keys must be non-empty.");
    }
    const kind = typeof value;
    if (kind !== "string" && kind !== "number" && kind !== "boolean") {
      throw new InvalidFilterError(
        `Metadata filter on "${key}" must be an equality on a scalar value.`,
        { key, valueType: value === null ? "null" : kind },
      );
    }
    if (kind === "number" && !Number.isFinite(value)) {
      throw new InvalidFilterError(`Metadata filter on "${key}" must be finite.`, { key });
    }
  }
}

export function matchesFilter(
  metadata: StoredRecord["metadata"],
  filter: MetadataFilter | undefined,
): boolean {
  if (!filter) {
    return true;
  }
  for (const [key, value] of Object.entries(filter)) {
    if (metadata[key] !== value) {
      return false;
    }
  }
  return true;
}
