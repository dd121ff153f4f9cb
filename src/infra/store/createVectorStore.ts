import type { AppConfig } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import type { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PersistentInMemoryVectorStore } from "./persistentInMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export function createVectorStore(config: AppConfig): VectorStore {
  switch (config.vectorStore) {
    case "memory":
      return new InMemoryVectorStore();
    case "file":
      return new PersistentInMemoryVectorStore(config.vectorIndexPath, {
        maxBytes: config.maxVectorIndexBytes,
      });
    case "pgvector": {
      if (!config.databaseUrl) {
        throw new ConfigurationError("DATABASE_URL is required when VECTOR_STORE=pgvector.");
      }
      return new PgVectorStore(createPostgresPool(config.databaseUrl), config.vectorDimension);
    }
  }
}
