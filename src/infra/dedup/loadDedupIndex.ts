import type { AppConfig } from "../../config/env.js";
import type { DedupIndex } from "../../domain/dedupIndex.js";
import { ConfigurationError, describeError } from "../../domain/errors.js";
import type { VectorStore } from "../../domain/vectorStore.js";
import { FileDedupIndex } from "./fileDedupIndex.js";
import { InMemoryDedupIndex } from "./inMemoryDedupIndex.js";

/**
 * Loads dedup history before any record is processed. `log` reads the hash
 * log file; `store` re-derives the set from payload hashes already in the
 * vector store.
 */
export async function loadDedupIndex(
  config: Pick<AppConfig, "dedupSource" | "dedupLogPath">,
  vectorStore: VectorStore,
): Promise<DedupIndex> {
  try {
    if (config.dedupSource === "log") {
      return await FileDedupIndex.open(config.dedupLogPath);
    }
    return new InMemoryDedupIndex(await vectorStore.listContentHashes());
  } catch (error) {
    throw new ConfigurationError(
      `Cannot load dedup history from ${config.dedupSource === "log" ? config.dedupLogPath : "the vector store"}: ${describeError(error)}`,
      { cause: error },
    );
  }
}
