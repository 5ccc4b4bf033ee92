import { describeError, ErrorPayload } from "../domain/errors.js";
import {
  IndexStats,
  IngestionReport,
  ReconstructedDocument,
  RetrievalResult,
} from "../domain/types.js";
import { Logger } from "../infra/logging/logger.js";
import { DocumentScope } from "../pipelines/documentScope.js";
import { IngestionPipeline } from "../pipelines/ingestion.js";
import { getIndexStats, listDocuments, reconstructDocument } from "../pipelines/reconstruction.js";
import { HierarchicalRetriever } from "../pipelines/retrieval.js";
import { planRetrieval, toSimilarityPercent } from "../utils/scores.js";

export interface FailedIngestion {
  path: string;
  error: ErrorPayload;
}

export interface IngestDocumentsResult {
  ingested_count: number;
  chunk_count: number;
  reports: IngestionReport[];
  failed: FailedIngestion[];
}

export interface SearchInput {
  query: string;
  /** Flat result budget; spread over documents by `planRetrieval`. */
  k?: number;
  nDocs?: number;
  nChunksPerDoc?: number;
}

export interface SearchHit {
  source: string;
  chunk_id: string;
  chunk_index: number | null;
  section: string | null;
  distance: number;
  similarity: number;
  parent_summary_distance: number;
  parent_similarity: number;
  text: string;
}

export interface SearchResult {
  query: string;
  n_docs: number;
  n_chunks_per_doc: number;
  collection: string;
  hits: SearchHit[];
}

export class DocumentIndexService {
  private readonly logger: Logger;

  constructor(
    private readonly scope: DocumentScope,
    private readonly ingestion: IngestionPipeline,
    private readonly retriever: HierarchicalRetriever,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "service" });
  }

  async ingestDocument(filePath: string): Promise<IngestionReport> {
    return this.ingestion.ingest(filePath);
  }

  async ingestDocuments(paths: string[]): Promise<IngestDocumentsResult> {
    const reports: IngestionReport[] = [];
    const failed: FailedIngestion[] = [];
    let chunkCount = 0;

    for (const filePath of paths) {
      try {
        const report = await this.ingestion.ingest(filePath);
        reports.push(report);
        chunkCount += report.chunksStored;
      } catch (error) {
        const payload = describeError(error);
        this.logger.warn({ path: filePath, code: payload.code }, "document not ingested");
        failed.push({ path: filePath, error: payload });
      }
    }

    return {
      ingested_count: reports.length,
      chunk_count: chunkCount,
      reports,
      failed,
    };
  }

  async search(input: SearchInput): Promise<SearchResult> {
    const plan = input.k === undefined ? null : planRetrieval(input.k);
    const nDocs = input.nDocs ?? plan?.nDocs;
    const nChunksPerDoc = input.nChunksPerDoc ?? plan?.nChunksPerDoc;

    const results = await this.retriever.retrieve(input.query, nDocs, nChunksPerDoc);
    const hits = plan ? results.slice(0, plan.k) : results;

    return {
      query: input.query,
      n_docs: nDocs ?? this.retriever.defaultNDocs,
      n_chunks_per_doc: nChunksPerDoc ?? this.retriever.defaultNChunksPerDoc,
      collection: this.scope.collection,
      hits: hits.map(toSearchHit),
    };
  }

  async listDocuments(): Promise<string[]> {
    return listDocuments(this.scope);
  }

  async reconstructDocument(sourceId: string): Promise<ReconstructedDocument> {
    return reconstructDocument(this.scope, sourceId);
  }

  async getStats(): Promise<IndexStats> {
    return getIndexStats(this.scope);
  }
}

function toSearchHit(result: RetrievalResult): SearchHit {
  const { metadata } = result.record;
  return {
    source: metadata.source ?? "",
    chunk_id: result.record.id,
    chunk_index: typeof metadata.chunk_index === "number" ? metadata.chunk_index : null,
    section: typeof metadata.section === "string" ? metadata.section : null,
    distance: Number(result.distance.toFixed(4)),
    similarity: toSimilarityPercent(result.distance),
    parent_summary_distance: Number(result.parentSummaryScore.toFixed(4)),
    parent_similarity: toSimilarityPercent(result.parentSummaryScore),
    text: result.record.text,
  };
}
