import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const envSchema = z.object({
  DATA_DIR: z.string().default("data"),
  VECTOR_STORE: z.enum(["memory", "file", "pgvector"]).default("file"),
  VECTOR_INDEX_PATH: z.string().default(".data/vector-index.json"),
  MAX_VECTOR_INDEX_BYTES: z.coerce.number().int().positive().default(200 * 1024 * 1024),
  DATABASE_URL: z.string().optional(),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(768),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("ollama"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  CHUNK_MAX_CHARS: z.coerce.number().int().positive().default(4000),
  CHUNK_OVERLAP_CHARS: z.coerce.number().int().nonnegative().default(200),
  DEDUP_SOURCE: z.enum(["log", "store"]).default("log"),
  DEDUP_LOG_PATH: z.string().default(".data/dedup-hashes.log"),
  MIN_FORUM_SCORE: z.coerce.number().int().optional(),
  MIN_CONTENT_LENGTH: z.coerce.number().int().nonnegative().default(0),
  INGEST_CONCURRENCY: z.coerce.number().int().positive().max(16).default(2),
  EMBED_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8_000),
});

export interface AppConfig {
  dataDir: string;
  vectorStore: "memory" | "file" | "pgvector";
  vectorIndexPath: string;
  maxVectorIndexBytes: number;
  databaseUrl: string | null;
  vectorDimension: number;
  embeddingProvider: "openai" | "ollama";
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  chunkMaxChars: number;
  chunkOverlapChars: number;
  dedupSource: "log" | "store";
  dedupLogPath: string;
  /** Forum posts scoring below this are skipped; null disables the filter. */
  minForumScore: number | null;
  minContentLength: number;
  concurrency: number;
  embedTimeoutMs: number;
  storeTimeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const parsed = result.data;

  if (parsed.VECTOR_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new ConfigurationError("VECTOR_STORE=pgvector requires DATABASE_URL.");
  }
  if (parsed.EMBEDDING_PROVIDER === "openai" && !parsed.OPENAI_API_KEY) {
    throw new ConfigurationError("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (parsed.CHUNK_OVERLAP_CHARS >= parsed.CHUNK_MAX_CHARS) {
    throw new ConfigurationError("CHUNK_OVERLAP_CHARS must be smaller than CHUNK_MAX_CHARS.");
  }

  return {
    dataDir: parsed.DATA_DIR,
    vectorStore: parsed.VECTOR_STORE,
    vectorIndexPath: parsed.VECTOR_INDEX_PATH,
    maxVectorIndexBytes: parsed.MAX_VECTOR_INDEX_BYTES,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorDimension: parsed.VECTOR_DIMENSION,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    chunkMaxChars: parsed.CHUNK_MAX_CHARS,
    chunkOverlapChars: parsed.CHUNK_OVERLAP_CHARS,
    dedupSource: parsed.DEDUP_SOURCE,
    dedupLogPath: parsed.DEDUP_LOG_PATH,
    minForumScore: parsed.MIN_FORUM_SCORE ?? null,
    minContentLength: parsed.MIN_CONTENT_LENGTH,
    concurrency: parsed.INGEST_CONCURRENCY,
    embedTimeoutMs: parsed.EMBED_TIMEOUT_MS,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },
  };
}

// An exported-but-empty variable means "use the default".
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
