export const SOURCE_TYPES = [
  "forum_post",
  "forum_comment",
  "repo_readme",
  "repo_file",
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export type Category = "forum" | "repository";

export interface Document {
  readonly sourceId: string;
  readonly sourceType: SourceType;
  readonly rawText: string;
  readonly sourceUrl: string;
  readonly author: string;
  readonly score: number;
  readonly createdAt: string | null;
  readonly explicitTags: readonly string[];
}

export interface Chunk {
  chunkId: string;
  parentSourceId: string;
  sequenceIndex: number;
  text: string;
  charCount: number;
  overlapWithPrevious: boolean;
  overlapLength: number;
  oversized: boolean;
  contentHash: string;
}

export interface MetadataPayload {
  category: Category;
  tags: string[];
  source_url: string;
  author: string;
  score: number;
  chunk_index: number;
  total_chunks: number;
  source_id: string;
  source_type: SourceType;
  created_at: string | null;
  source_file: string | null;
}

export interface StoredPayload extends MetadataPayload {
  chunk_id: string;
  content_hash: string;
  text: string;
  char_count: number;
  oversized: boolean;
}

export type RecordState =
  | "NORMALIZED"
  | "CHUNKED"
  | "FILTERED"
  | "DEDUP_SKIPPED"
  | "ENRICHED"
  | "EMBEDDED"
  | "STORED"
  | "FAILED";

export type FailureStage = "load" | "normalize" | "chunk" | "embed" | "store" | "dedup";

export interface IngestionFailure {
  source: string;
  stage: FailureStage;
  reason: string;
}

export interface IngestionSummary {
  dry_run: boolean;
  cancelled: boolean;
  file_count: number;
  record_count: number;
  processed_count: number;
  chunk_count: number;
  stored_count: number;
  duplicate_count: number;
  filtered_count: number;
  oversized_count: number;
  error_count: number;
  per_category_counts: Partial<Record<Category, number>>;
  failures: IngestionFailure[];
}

export interface SourceFile {
  path: string;
  sourceType: SourceType;
  records: unknown[];
}
