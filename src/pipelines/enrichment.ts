import type {
  Category,
  Chunk,
  Document,
  MetadataPayload,
  SourceType,
  StoredPayload,
} from "../domain/types.js";
import { normalizeTags } from "../utils/text.js";
import { DEFAULT_KEYWORD_COUNT, extractKeywords } from "./keywords.js";

const CATEGORY_BY_SOURCE_TYPE: Readonly<Record<SourceType, Category>> = {
  forum_post: "forum",
  forum_comment: "forum",
  repo_readme: "repository",
  repo_file: "repository",
};

const LLM_TERMS = ["claude", "chatgpt", "gpt-4", "llm"];

export interface EnrichOptions {
  keywordCount?: number;
  /** Path of the source file the record came from; null for inline records. */
  sourceFile?: string | null;
}

export function categoryFor(sourceType: SourceType): Category {
  return CATEGORY_BY_SOURCE_TYPE[sourceType];
}

/** Topic tags derived from what the chunk text mentions. */
export function contentTags(text: string): string[] {
  const lower = text.toLowerCase();
  const tags: string[] = [];
  if (lower.includes("prompt")) {
    tags.push("prompts");
  }
  if (LLM_TERMS.some((term) => lower.includes(term))) {
    tags.push("llm");
  }
  if (lower.includes("code") || text.includes("```")) {
    tags.push("code");
  }
  return tags;
}

export function enrichChunk(
  chunk: Pick<Chunk, "text" | "sequenceIndex">,
  document: Document,
  totalChunks: number,
  { keywordCount = DEFAULT_KEYWORD_COUNT, sourceFile = null }: EnrichOptions = {},
): MetadataPayload {
  return {
    category: categoryFor(document.sourceType),
    tags: normalizeTags([
      ...document.explicitTags,
      ...extractKeywords(chunk.text, keywordCount),
      ...contentTags(chunk.text),
    ]),
    source_url: document.sourceUrl,
    author: document.author,
    score: document.score,
    chunk_index: chunk.sequenceIndex,
    total_chunks: totalChunks,
    source_id: document.sourceId,
    source_type: document.sourceType,
    created_at: document.createdAt,
    source_file: sourceFile,
  };
}

export function toStoredPayload(chunk: Chunk, metadata: MetadataPayload): StoredPayload {
  return {
    ...metadata,
    chunk_id: chunk.chunkId,
    content_hash: chunk.contentHash,
    text: chunk.text,
    char_count: chunk.charCount,
    oversized: chunk.oversized,
  };
}
