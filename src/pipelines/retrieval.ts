import { InvalidRequestError, RetrievalError } from "../domain/errors.js";
import { RetrievalResult, ScoredRecord, StoredRecord } from "../domain/types.js";
import { Logger } from "../infra/logging/logger.js";
import { DocumentScope } from "./documentScope.js";

export const DEFAULT_N_DOCS = 3;
export const DEFAULT_N_CHUNKS_PER_DOC = 5;

export interface HierarchicalRetrieverOptions {
  nDocs?: number;
  nChunksPerDoc?: number;
  logger?: Logger;
}

/**
 * Coarse-to-fine search. Summaries pick the documents, then chunks are ranked
 * inside each picked document.
 *
 * Results come back grouped by document in summary order; within a group
 * chunks keep their own distance order. There is no global re-sort, and
 * summary and chunk distances are never compared with each other.
 */
export class HierarchicalRetriever {
  private readonly nDocs: number;

  private readonly nChunksPerDoc: number;

  private readonly logger: Logger | null;

  constructor(
    private readonly scope: DocumentScope,
    options: HierarchicalRetrieverOptions = {},
  ) {
    this.nDocs = options.nDocs ?? DEFAULT_N_DOCS;
    this.nChunksPerDoc = options.nChunksPerDoc ?? DEFAULT_N_CHUNKS_PER_DOC;
    assertCount("nDocs", this.nDocs);
    assertCount("nChunksPerDoc", this.nChunksPerDoc);
    this.logger = options.logger?.child({ component: "retriever" }) ?? null;
  }

  get defaultNDocs(): number {
    return this.nDocs;
  }

  get defaultNChunksPerDoc(): number {
    return this.nChunksPerDoc;
  }

  async retrieve(
    query: string,
    nDocs: number = this.nDocs,
    nChunksPerDoc: number = this.nChunksPerDoc,
  ): Promise<RetrievalResult[]> {
    if (!query.trim()) {
      throw new InvalidRequestError("Query must not be empty.");
    }
    assertCount("nDocs", nDocs);
    assertCount("nChunksPerDoc", nChunksPerDoc);

    const summaries = await this.searchSummaries(query, nDocs);
    if (summaries.length === 0) {
      this.logger?.debug({ nDocs }, "coarse stage returned no summaries");
      return [];
    }

    const results: RetrievalResult[] = [];
    const expanded = new Set<string>();
    for (const summary of summaries) {
      const sourceId = summary.record.metadata.source;
      if (typeof sourceId !== "string" || !sourceId) {
        this.logger?.debug({ recordId: summary.record.id }, "summary without source skipped");
        continue;
      }
      if (expanded.has(sourceId)) {
        continue;
      }
      expanded.add(sourceId);

      const chunks = await this.searchChunks(query, sourceId, nChunksPerDoc);
      for (const chunk of chunks) {
        results.push({
          record: chunk.record,
          distance: chunk.distance,
          parentSummaryScore: summary.distance,
        });
      }
    }

    this.logger?.debug(
      { documents: expanded.size, results: results.length },
      "hierarchical retrieval finished",
    );
    return results;
  }

  /** Same ordering as `retrieve`, without scores. */
  async retrieveSimple(
    query: string,
    nDocs?: number,
    nChunksPerDoc?: number,
  ): Promise<StoredRecord[]> {
    const results = await this.retrieve(query, nDocs, nChunksPerDoc);
    return results.map((result) => result.record);
  }

  private async searchSummaries(query: string, nDocs: number): Promise<ScoredRecord[]> {
    try {
      const hits = await this.scope.searchSummaries(query, nDocs);
      return hits.slice(0, nDocs);
    } catch (error) {
      throw new RetrievalError("coarse", null, { cause: error });
    }
  }

  private async searchChunks(
    query: string,
    sourceId: string,
    nChunksPerDoc: number,
  ): Promise<ScoredRecord[]> {
    try {
      const hits = await this.scope.searchChunks(query, sourceId, nChunksPerDoc);
      return hits.slice(0, nChunksPerDoc);
    } catch (error) {
      throw new RetrievalError("fine", sourceId, { cause: error });
    }
  }
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidRequestError(`${name} must be a positive integer, got ${value}.`, {
      [name]: value,
    });
  }
}
