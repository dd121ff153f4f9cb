import type { StoredPayload } from "../../src/domain/types.js";

export function storedPayload(overrides: Partial<StoredPayload> = {}): StoredPayload {
  return {
    category: "forum",
    tags: ["prompts"],
    source_url: "forum://community/1",
    author: "alice",
    score: 1,
    chunk_index: 0,
    total_chunks: 1,
    source_id: "forum_post:1",
    source_type: "forum_post",
    created_at: "2024-03-01T00:00:00.000Z",
    source_file: "data/forum/sample.json",
    chunk_id: "forum_post:1#0",
    content_hash: "a".repeat(64),
    text: "Chunk text.",
    char_count: 11,
    oversized: false,
    ...overrides,
  };
}
