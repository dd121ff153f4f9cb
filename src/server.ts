import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./appServer.js";
import { bootstrap } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { logger } from "./infra/logging/logger.js";

async function main() {
  const runtime = await bootstrap(loadConfig());
  const server = createAppServer(runtime);
  await server.connect(new StdioServerTransport());
  logger.info("MCP stdio server ready");

  const shutdown = async () => {
    await server.close();
    await runtime.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: describeError(error) }, "failed to start MCP server");
  process.exit(1);
});
