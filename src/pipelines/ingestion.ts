import { LoadError, StoreWriteError } from "../domain/errors.js";
import {
  ChunkRecord,
  IngestionReport,
  SummaryRecord,
  ValidationReport,
} from "../domain/types.js";
import { LoadedDocument, loadDocument } from "../infra/parsers/documentLoader.js";
import { Logger } from "../infra/logging/logger.js";
import { truncateAtBoundary } from "../utils/text.js";
import { boundaryAt, chunkText } from "./chunking.js";
import { DocumentScope } from "./documentScope.js";
import { FileValidator } from "./validation.js";

export interface IngestionOptions {
  maxFileSizeBytes: number;
  chunkWindow: number;
  chunkOverlap: number;
  summaryMaxChars: number;
  /** Delete records already stored for the same source before writing. */
  replaceExisting: boolean;
}

export type DocumentLoaderFn = (filePath: string) => Promise<LoadedDocument>;

export interface DocumentRecords {
  sourceId: string;
  summary: SummaryRecord;
  chunks: ChunkRecord[];
}

export class IngestionPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly scope: DocumentScope,
    private readonly validator: FileValidator,
    private readonly options: IngestionOptions,
    logger: Logger,
    private readonly load: DocumentLoaderFn = loadDocument,
  ) {
    this.logger = logger.child({ component: "ingestion" });
  }

  async ingest(filePath: string): Promise<IngestionReport> {
    const validation = await this.validator.validate(filePath, this.options.maxFileSizeBytes);
    const document = await this.loadValidated(validation);
    if (!document.text) {
      throw new LoadError("EmptyContent", `No text content found in ${validation.fileName}.`, {
        path: validation.absolutePath,
        format: document.format,
      });
    }

    const { sourceId, summary, chunks } = buildDocumentRecords(
      validation,
      document,
      this.options,
    );
    this.logger.info(
      { sourceId, format: document.format, chunks: chunks.length, collection: this.scope.collection },
      "ingesting document",
    );

    let replacedRecords = 0;
    if (this.options.replaceExisting) {
      try {
        replacedRecords = await this.scope.deleteSource(sourceId);
      } catch (error) {
        throw this.writeFailure("cleanup", sourceId, false, error);
      }
    }

    try {
      await this.scope.writeSummary(summary);
    } catch (error) {
      throw this.writeFailure("summary", sourceId, false, error);
    }

    if (chunks.length > 0) {
      try {
        await this.scope.writeChunks(chunks);
      } catch (error) {
        throw this.writeFailure("chunks", sourceId, true, error);
      }
    }

    this.logger.info(
      { sourceId, chunksStored: chunks.length, replacedRecords },
      "document ingested",
    );

    return {
      success: true,
      sourceId,
      summaryStored: true,
      chunksStored: chunks.length,
      collection: this.scope.collection,
      replacedRecords,
      validation,
    };
  }

  private async loadValidated(validation: ValidationReport): Promise<LoadedDocument> {
    try {
      return await this.load(validation.absolutePath);
    } catch (error) {
      if (error instanceof LoadError) {
        throw error;
      }
      throw new LoadError(
        "ParseFailed",
        `Failed to load ${validation.fileName}: ${error instanceof Error ? error.message : String(error)}`,
        { path: validation.absolutePath },
        { cause: error },
      );
    }
  }

  private writeFailure(
    phase: "cleanup" | "summary" | "chunks",
    sourceId: string,
    summaryStored: boolean,
    error: unknown,
  ): StoreWriteError {
    const failure = new StoreWriteError(phase, sourceId, summaryStored, 0, { cause: error });
    this.logger.error({ err: error, sourceId, phase, summaryStored }, "vector store write failed");
    return failure;
  }
}

export function deriveSourceId(validation: ValidationReport): string {
  return validation.fileName;
}

export function buildDocumentRecords(
  validation: ValidationReport,
  document: LoadedDocument,
  options: Pick<IngestionOptions, "chunkWindow" | "chunkOverlap" | "summaryMaxChars">,
): DocumentRecords {
  const sourceId = deriveSourceId(validation);
  const shared = {
    source: sourceId,
    file_name: validation.fileName,
    extension: validation.extension,
  };

  const chunks: ChunkRecord[] = [];
  for (const chunk of chunkText(document.text, {
    window: options.chunkWindow,
    overlap: options.chunkOverlap,
  })) {
    const section = boundaryAt(document.boundaries, chunk.start);
    chunks.push({
      text: chunk.text,
      metadata: {
        ...shared,
        type: "chunk",
        chunk_index: chunk.index,
        ...(section ? { section } : {}),
      },
    });
  }

  const summary: SummaryRecord = {
    text: truncateAtBoundary(document.text, options.summaryMaxChars),
    metadata: { ...shared, type: "summary", chunk_count: chunks.length },
  };

  return { sourceId, summary, chunks };
}
