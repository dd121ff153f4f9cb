import type { Pool } from "pg";
import { VectorStoreWriteError } from "../../domain/errors.js";
import type { StoredPayload } from "../../domain/types.js";
import type {
  VectorQueryFilter,
  VectorQueryHit,
  VectorStore,
} from "../../domain/vectorStore.js";
import { toVectorLiteral } from "../../utils/vector.js";

interface PgChunkRow {
  id: string;
  payload: StoredPayload;
  score: number;
}

export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS knowledge_chunks (
        id TEXT PRIMARY KEY,
        content_hash TEXT NOT NULL,
        category TEXT NOT NULL,
        tags TEXT[] NOT NULL DEFAULT '{}',
        created_at TIMESTAMPTZ NULL,
        payload JSONB NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        stored_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_knowledge_chunks_hash ON knowledge_chunks(content_hash)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_knowledge_chunks_category ON knowledge_chunks(category)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_knowledge_chunks_embedding
      ON knowledge_chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async upsert(id: string, vector: number[], payload: StoredPayload): Promise<void> {
    await this.initialize();
    if (vector.length !== this.vectorDimension) {
      throw new VectorStoreWriteError(
        `Embedding dimension ${vector.length} does not match VECTOR_DIMENSION=${this.vectorDimension}.`,
      );
    }

    try {
      await this.pool.query(
        `
          INSERT INTO knowledge_chunks (id, content_hash, category, tags, created_at, payload, embedding)
          VALUES ($1, $2, $3, $4::text[], $5::timestamptz, $6::jsonb, $7::vector)
          ON CONFLICT (id)
          DO UPDATE SET
            content_hash = EXCLUDED.content_hash,
            category = EXCLUDED.category,
            tags = EXCLUDED.tags,
            created_at = EXCLUDED.created_at,
            payload = EXCLUDED.payload,
            embedding = EXCLUDED.embedding,
            stored_at = NOW()
        `,
        [
          id,
          payload.content_hash,
          payload.category,
          payload.tags,
          payload.created_at,
          JSON.stringify(payload),
          toVectorLiteral(vector),
        ],
      );
    } catch (error) {
      throw new VectorStoreWriteError(`pgvector upsert failed for ${id}.`, { cause: error });
    }
  }

  async query(
    vector: number[],
    filter: VectorQueryFilter,
    topK: number,
  ): Promise<VectorQueryHit[]> {
    await this.initialize();

    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT
          id,
          payload,
          (1 - (embedding <=> $1::vector)) AS score
        FROM knowledge_chunks
        WHERE ($2::text IS NULL OR category = $2::text)
          AND ($3::text[] IS NULL OR tags && $3::text[])
          AND ($4::timestamptz IS NULL OR created_at >= $4::timestamptz)
          AND ($5::timestamptz IS NULL OR created_at <= $5::timestamptz)
        ORDER BY embedding <=> $1::vector, id ASC
        LIMIT $6
      `,
      [
        toVectorLiteral(vector),
        filter.category ?? null,
        filter.tags?.length ? filter.tags.map((tag) => tag.toLowerCase()) : null,
        filter.createdFrom ?? null,
        filter.createdTo ?? null,
        topK,
      ],
    );

    return result.rows.map((row) => ({
      id: row.id,
      payload: row.payload,
      score: Number(row.score),
    }));
  }

  async listContentHashes(): Promise<string[]> {
    await this.initialize();
    const result = await this.pool.query<{ content_hash: string }>(
      `SELECT DISTINCT content_hash FROM knowledge_chunks`,
    );
    return result.rows.map((row) => row.content_hash);
  }

  async count(): Promise<number> {
    await this.initialize();
    const result = await this.pool.query<{ count: string }>(
      "SELECT COUNT(*)::text AS count FROM knowledge_chunks",
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
