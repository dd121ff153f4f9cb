import type { AppConfig } from "./config/env.js";
import type { DedupIndex } from "./domain/dedupIndex.js";
import { ConfigurationError, describeError } from "./domain/errors.js";
import type { VectorStore } from "./domain/vectorStore.js";
import { createEmbeddingClient } from "./infra/ai/createEmbeddingClient.js";
import type { EmbeddingClient } from "./infra/ai/types.js";
import { loadDedupIndex } from "./infra/dedup/loadDedupIndex.js";
import { logger as rootLogger, type Logger } from "./infra/logging/logger.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { RetryPolicy } from "./utils/retry.js";

export interface AppRuntime {
  config: AppConfig;
  vectorStore: VectorStore;
  embeddingClient: EmbeddingClient;
  dedupIndex: DedupIndex;
  retryPolicy: RetryPolicy;
  logger: Logger;
  close: () => Promise<void>;
}

export interface RuntimeOverrides {
  vectorStore?: VectorStore;
  embeddingClient?: EmbeddingClient;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

/**
 * Builds every collaborator and runs the pre-flight checks: the vector store
 * must be reachable and the dedup history loadable before any record is read.
 */
export async function bootstrap(
  config: AppConfig,
  overrides: RuntimeOverrides = {},
): Promise<AppRuntime> {
  const logger = overrides.logger ?? rootLogger;
  const vectorStore = overrides.vectorStore ?? createVectorStore(config);
  const embeddingClient = overrides.embeddingClient ?? createEmbeddingClient(config);

  try {
    await vectorStore.initialize();
  } catch (error) {
    await vectorStore.close().catch((closeError: unknown) => {
      logger.debug({ err: describeError(closeError) }, "vector store close failed");
    });
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(
      `Vector store (${config.vectorStore}) is unavailable: ${describeError(error)}`,
      { cause: error },
    );
  }

  let dedupIndex: DedupIndex;
  try {
    dedupIndex = await loadDedupIndex(config, vectorStore);
  } catch (error) {
    await vectorStore.close();
    throw error;
  }

  const retryPolicy =
    overrides.retryPolicy ??
    new RetryPolicy({
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    });

  logger.debug(
    {
      vector_store: config.vectorStore,
      embedding_provider: embeddingClient.provider,
      dedup_source: config.dedupSource,
      known_hashes: dedupIndex.size(),
    },
    "runtime ready",
  );

  return {
    config,
    vectorStore,
    embeddingClient,
    dedupIndex,
    retryPolicy,
    logger,
    close: async () => {
      await vectorStore.close();
    },
  };
}
