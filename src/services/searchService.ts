import type { AppRuntime } from "../bootstrap.js";
import { EmbeddingTimeoutError } from "../domain/errors.js";
import type { Category } from "../domain/types.js";
import type { VectorQueryHit } from "../domain/vectorStore.js";
import { withTimeout } from "../utils/timeout.js";

export interface SearchRequest {
  query: string;
  category?: Category;
  tags?: string[];
  createdFrom?: string;
  createdTo?: string;
  topK?: number;
}

export interface SearchHit {
  score: number;
  chunk_id: string;
  category: Category;
  tags: string[];
  source_url: string;
  author: string;
  chunk_index: number;
  total_chunks: number;
  created_at: string | null;
  source_file: string | null;
  snippet: string;
}

const SNIPPET_CHARS = 240;

export async function searchChunks(
  runtime: Pick<AppRuntime, "embeddingClient" | "vectorStore" | "retryPolicy" | "config">,
  request: SearchRequest,
): Promise<SearchHit[]> {
  const timeoutMs = runtime.config.embedTimeoutMs;
  const vector = await runtime.retryPolicy.execute(() =>
    withTimeout(
      (signal) => runtime.embeddingClient.embed(request.query, { signal }),
      timeoutMs,
      () => new EmbeddingTimeoutError(timeoutMs),
    ),
  );

  const hits = await runtime.vectorStore.query(
    vector,
    {
      category: request.category,
      tags: request.tags,
      createdFrom: request.createdFrom,
      createdTo: request.createdTo,
    },
    request.topK ?? 5,
  );
  return hits.map(toSearchHit);
}

function toSearchHit(hit: VectorQueryHit): SearchHit {
  return {
    score: Number(hit.score.toFixed(4)),
    chunk_id: hit.id,
    category: hit.payload.category,
    tags: hit.payload.tags,
    source_url: hit.payload.source_url,
    author: hit.payload.author,
    chunk_index: hit.payload.chunk_index,
    total_chunks: hit.payload.total_chunks,
    created_at: hit.payload.created_at,
    source_file: hit.payload.source_file ?? null,
    snippet: hit.payload.text.slice(0, SNIPPET_CHARS),
  };
}
