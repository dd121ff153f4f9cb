import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppRuntime } from "../bootstrap.js";
import { searchChunks } from "../services/searchService.js";

export function registerSearchChunksTool(server: McpServer, runtime: AppRuntime) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves the stored chunks most similar to a query.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(50).optional().describe("Max hits"),
        category: z.enum(["forum", "repository"]).optional(),
        tags: z.array(z.string()).optional().describe("Match chunks carrying any of these tags"),
        created_from: z.string().datetime({ offset: true }).optional(),
        created_to: z.string().datetime({ offset: true }).optional(),
      },
    },
    async ({ query, top_k, category, tags, created_from, created_to }) => {
      const hits = await searchChunks(runtime, {
        query,
        topK: top_k,
        category,
        tags,
        createdFrom: created_from,
        createdTo: created_to,
      });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ query, hits }, null, 2),
          },
        ],
      };
    },
  );
}
