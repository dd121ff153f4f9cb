import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ConfigurationError } from "../src/domain/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.vectorStore).toBe("file");
    expect(config.embeddingProvider).toBe("ollama");
    expect(config.chunkMaxChars).toBe(4000);
    expect(config.chunkOverlapChars).toBe(200);
    expect(config.concurrency).toBe(2);
    expect(config.dedupSource).toBe("log");
    expect(config.databaseUrl).toBeNull();
    expect(config.minForumScore).toBeNull();
    expect(config.minContentLength).toBe(0);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8_000 });
  });

  it("coerces numeric variables and ignores blank ones", () => {
    const config = loadConfig({
      CHUNK_MAX_CHARS: "1200",
      CHUNK_OVERLAP_CHARS: "",
      INGEST_CONCURRENCY: "4",
      VECTOR_STORE: "memory",
      DEDUP_SOURCE: "store",
    });
    expect(config.chunkMaxChars).toBe(1200);
    expect(config.chunkOverlapChars).toBe(200);
    expect(config.concurrency).toBe(4);
    expect(config.vectorStore).toBe("memory");
    expect(config.dedupSource).toBe("store");
  });

  it("reads the quality filters", () => {
    const config = loadConfig({ MIN_FORUM_SCORE: "3", MIN_CONTENT_LENGTH: "50" });
    expect(config.minForumScore).toBe(3);
    expect(config.minContentLength).toBe(50);
    expect(() => loadConfig({ MIN_CONTENT_LENGTH: "-1" })).toThrow(/MIN_CONTENT_LENGTH/);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ VECTOR_STORE: "qdrant" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ INGEST_CONCURRENCY: "0" })).toThrow(/INGEST_CONCURRENCY/);
  });

  it("enforces cross-field requirements", () => {
    expect(() => loadConfig({ VECTOR_STORE: "pgvector" })).toThrow("requires DATABASE_URL");
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "openai" })).toThrow("requires OPENAI_API_KEY");
    expect(() => loadConfig({ CHUNK_MAX_CHARS: "100", CHUNK_OVERLAP_CHARS: "100" })).toThrow(
      "CHUNK_OVERLAP_CHARS must be smaller",
    );

    const config = loadConfig({
      VECTOR_STORE: "pgvector",
      DATABASE_URL: "postgres://localhost/test",
      EMBEDDING_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
    });
    expect(config.databaseUrl).toBe("postgres://localhost/test");
    expect(config.openaiApiKey).toBe("test-secret");
  });
});
