import { IndexStats, ReconstructedDocument, StoredRecord } from "../domain/types.js";
import { DocumentScope } from "./documentScope.js";

/** Summary plus every chunk of one source, chunks in `chunk_index` order. */
export async function reconstructDocument(
  scope: DocumentScope,
  sourceId: string,
): Promise<ReconstructedDocument> {
  const summaries = await scope.listSummaries(sourceId);
  const chunks = sortByChunkIndex(await scope.listChunks(sourceId));

  return {
    sourceId,
    summary: summaries[0] ?? null,
    chunks,
    totalChunks: chunks.length,
  };
}

export async function listDocuments(scope: DocumentScope): Promise<string[]> {
  return collectSources(await scope.listSummaries());
}

export async function getIndexStats(scope: DocumentScope): Promise<IndexStats> {
  const summaries = await scope.listSummaries();
  const chunks = await scope.listChunks();
  const sourceIds = collectSources([...summaries, ...chunks]);

  return {
    totalSummaries: summaries.length,
    totalChunks: chunks.length,
    uniqueDocuments: sourceIds.length,
    avgChunksPerDoc: sourceIds.length > 0 ? chunks.length / sourceIds.length : 0,
    sourceIds,
  };
}

function sortByChunkIndex(records: StoredRecord[]): StoredRecord[] {
  return [...records].sort((a, b) => chunkIndexOf(a) - chunkIndexOf(b));
}

function chunkIndexOf(record: StoredRecord): number {
  const index = record.metadata.chunk_index;
  return typeof index === "number" ? index : 0;
}

function collectSources(records: StoredRecord[]): string[] {
  const sources = new Set<string>();
  for (const record of records) {
    const source = record.metadata.source;
    if (typeof source === "string" && source) {
      sources.add(source);
    }
  }
  return [...sources].sort();
}
