import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppRuntime } from "../bootstrap.js";
import { PersistentInMemoryVectorStore } from "../infra/store/persistentInMemoryVectorStore.js";

export function registerHealthCheckTool(server: McpServer, runtime: AppRuntime) {
  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns store, embedding and dedup status.",
      inputSchema: {},
    },
    async () => {
      const { vectorStore } = runtime;
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                status: "ok",
                vector_store: runtime.config.vectorStore,
                stored_chunks: await vectorStore.count(),
                vector_index:
                  vectorStore instanceof PersistentInMemoryVectorStore
                    ? await vectorStore.getStorageInfo()
                    : null,
                embedding_provider: runtime.embeddingClient.provider,
                dedup_source: runtime.config.dedupSource,
                known_hashes: runtime.dedupIndex.size(),
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
