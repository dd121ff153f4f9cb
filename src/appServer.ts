import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppRuntime } from "./bootstrap.js";
import { registerHealthCheckTool } from "./tools/healthCheck.js";
import { registerIngestSourcesTool } from "./tools/ingestSources.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export function createAppServer(runtime: AppRuntime): McpServer {
  const server = new McpServer({
    name: "knowledge-ingest",
    version: "0.1.0",
  });

  registerHealthCheckTool(server, runtime);
  registerIngestSourcesTool(server, runtime);
  registerSearchChunksTool(server, runtime);

  return server;
}
