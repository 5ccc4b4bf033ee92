export type RecordType = "summary" | "chunk";

export type MetadataValue = string | number | boolean;

export type MetadataFilter = Record<string, MetadataValue>;

export interface RecordMetadata {
  source: string;
  type: RecordType;
  chunk_index?: number;
  file_name?: string;
  extension?: string;
  section?: string;
  [key: string]: MetadataValue | undefined;
}

export interface SummaryMetadata extends RecordMetadata {
  type: "summary";
}

export interface ChunkMetadata extends RecordMetadata {
  type: "chunk";
  chunk_index: number;
}

export interface DocumentInput<M extends RecordMetadata = RecordMetadata> {
  text: string;
  metadata: M;
}

export type SummaryRecord = DocumentInput<SummaryMetadata>;

export type ChunkRecord = DocumentInput<ChunkMetadata>;

export interface StoredRecord {
  id: string;
  text: string;
  metadata: Partial<RecordMetadata>;
}

export interface ScoredRecord {
  record: StoredRecord;
  distance: number;
}

export interface RetrievalResult {
  record: StoredRecord;
  distance: number;
  parentSummaryScore: number;
}

export interface ValidationReport {
  valid: true;
  absolutePath: string;
  fileName: string;
  sizeBytes: number;
  sizeMb: number;
  extension: string;
  declaredContentType: string | null;
  contentType: string;
  warnings: string[];
}

export interface IngestionReport {
  success: true;
  sourceId: string;
  summaryStored: boolean;
  chunksStored: number;
  collection: string;
  replacedRecords: number;
  validation: ValidationReport;
}

export interface ReconstructedDocument {
  sourceId: string;
  summary: StoredRecord | null;
  chunks: StoredRecord[];
  totalChunks: number;
}

export interface IndexStats {
  totalSummaries: number;
  totalChunks: number;
  uniqueDocuments: number;
  avgChunksPerDoc: number;
  sourceIds: string[];
}
