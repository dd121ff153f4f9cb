import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppRuntime } from "../bootstrap.js";
import { SOURCE_TYPES } from "../domain/types.js";
import { createOrchestrator, runIngestion } from "../services/ingestionService.js";

export function registerIngestSourcesTool(server: McpServer, runtime: AppRuntime) {
  server.registerTool(
    "ingest_sources",
    {
      title: "Ingest Sources",
      description:
        "Ingests scraped forum/repository JSON files (or inline records) into the vector store.",
      inputSchema: {
        source: z.enum(["forum", "repo", "all"]).optional().describe("Source selection"),
        file: z.string().optional().describe("Single JSON file to ingest instead of a selection"),
        records: z.array(z.unknown()).optional().describe("Inline records to ingest"),
        source_type: z.enum(SOURCE_TYPES).optional().describe("Source type of inline records"),
        dry_run: z.boolean().optional().describe("Run the pipeline without writing"),
        concurrency: z.number().int().min(1).max(16).optional(),
      },
    },
    async ({ source, file, records, source_type, dry_run, concurrency }) => {
      if (records && !source_type) {
        return {
          isError: true,
          content: [{ type: "text", text: "source_type is required with inline records." }],
        };
      }

      const summary =
        records && source_type
          ? await createOrchestrator(runtime, { dryRun: dry_run }).ingestRecords(
              source_type,
              records,
              "mcp",
            )
          : await runIngestion(runtime, {
              source: source ?? "all",
              file,
              dryRun: dry_run,
              concurrency,
            });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(summary, null, 2),
          },
        ],
      };
    },
  );
}
