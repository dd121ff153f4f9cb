import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError, VectorStoreWriteError } from "../../domain/errors.js";
import { SOURCE_TYPES, type StoredPayload } from "../../domain/types.js";
import type { VectorQueryFilter, VectorQueryHit } from "../../domain/vectorStore.js";
import { InMemoryVectorStore, type InMemoryVectorStoreSnapshot } from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;

const payloadSchema = z.object({
  category: z.enum(["forum", "repository"]),
  tags: z.array(z.string()),
  source_url: z.string(),
  author: z.string(),
  score: z.number(),
  chunk_index: z.number().int(),
  total_chunks: z.number().int(),
  source_id: z.string(),
  source_type: z.enum(SOURCE_TYPES),
  created_at: z.string().nullable(),
  source_file: z.string().nullable().default(null),
  chunk_id: z.string(),
  content_hash: z.string(),
  text: z.string(),
  char_count: z.number().int(),
  oversized: z.boolean(),
});

const persistedSchema = z.object({
  format_version: z.number(),
  saved_at: z.string(),
  snapshot: z.object({
    points: z.array(
      z.object({
        id: z.string(),
        vector: z.array(z.number()),
        payload: payloadSchema,
      }),
    ),
  }),
});

type PersistedVectorIndex = z.infer<typeof persistedSchema>;

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

export interface VectorIndexStorageInfo {
  path: string;
  exists: boolean;
  format_version: number;
  max_bytes: number;
  size_bytes: number;
  utilization_ratio: number;
}

/** JSON-snapshot variant of the in-memory store, rewritten after every upsert. */
export class PersistentInMemoryVectorStore extends InMemoryVectorStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.absolutePath, "utf-8");
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }
    if (raw !== null) {
      this.importSnapshot(parseSnapshotFromDisk(raw, this.absolutePath));
    }

    this.initialized = true;
  }

  async upsert(id: string, vector: number[], payload: StoredPayload): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(async () => {
      const previous = this.pointsById.get(id);
      await super.upsert(id, vector, payload);
      try {
        await this.persistNow();
      } catch (error) {
        if (previous) {
          this.pointsById.set(id, previous);
        } else {
          this.pointsById.delete(id);
        }
        throw error;
      }
    });
  }

  async query(
    vector: number[],
    filter: VectorQueryFilter,
    topK: number,
  ): Promise<VectorQueryHit[]> {
    await this.initialize();
    return super.query(vector, filter, topK);
  }

  async listContentHashes(): Promise<string[]> {
    await this.initialize();
    return super.listContentHashes();
  }

  async count(): Promise<number> {
    await this.initialize();
    return super.count();
  }

  async getStorageInfo(): Promise<VectorIndexStorageInfo> {
    await this.initialize();
    const stats = await this.readStorageStat();
    return {
      path: this.absolutePath,
      exists: stats.exists,
      format_version: CURRENT_FORMAT_VERSION,
      max_bytes: this.options.maxBytes,
      size_bytes: stats.sizeBytes,
      utilization_ratio:
        this.options.maxBytes > 0 ? Number((stats.sizeBytes / this.options.maxBytes).toFixed(4)) : 0,
    };
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task);
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedVectorIndex = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new VectorStoreWriteError(
        `Vector index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
        { retryable: false },
      );
    }

    const tempPath = `${this.absolutePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
      await fs.writeFile(tempPath, serialized, "utf-8");
      await fs.rename(tempPath, this.absolutePath);
    } catch (error) {
      throw new VectorStoreWriteError(`Cannot write vector index ${this.absolutePath}.`, {
        cause: error,
      });
    }
  }

  private async readStorageStat(): Promise<{ exists: boolean; sizeBytes: number }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, sizeBytes: stat.size };
    } catch (error) {
      if (isFileMissing(error)) {
        return { exists: false, sizeBytes: 0 };
      }
      throw error;
    }
  }
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseSnapshotFromDisk(raw: string, filePath: string): InMemoryVectorStoreSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Vector index ${filePath} is not valid JSON.`, { cause: error });
  }

  const parsed = persistedSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid vector index snapshot format in ${filePath}.`);
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new ConfigurationError(
      `Unsupported vector index format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data.snapshot;
}
