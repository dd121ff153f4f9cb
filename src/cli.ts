#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import "dotenv/config";
import { bootstrap } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { ConfigurationError, describeError } from "./domain/errors.js";
import { logger } from "./infra/logging/logger.js";
import { runIngestion } from "./services/ingestionService.js";
import { searchChunks } from "./services/searchService.js";
import type { SourceSelection } from "./infra/sources/sourceFileLoader.js";
import type { Category } from "./domain/types.js";

interface IngestCommandOptions {
  source: SourceSelection;
  file?: string;
  dryRun: boolean;
  dataDir?: string;
  concurrency?: number;
}

interface SearchCommandOptions {
  category?: Category;
  tag: string[];
  from?: string;
  to?: string;
  topK: number;
}

function buildProgram(): Command {
  const program = new Command()
    .name("knowledge-ingest")
    .description("Ingest scraped forum and repository knowledge into a vector store.")
    .showHelpAfterError();

  program
    .command("ingest")
    .description("Normalize, chunk, deduplicate, enrich, embed and store source records.")
    .addOption(
      new Option("--source <selection>", "source selection")
        .choices(["forum", "repo", "all"])
        .default("all"),
    )
    .option("--file <path>", "ingest a single JSON file instead of a selection")
    .option("--dry-run", "run the pipeline without writing to the store or hash log", false)
    .option("--data-dir <dir>", "directory holding forum/ and repo/ source files")
    .option("--concurrency <n>", "source files processed in parallel", parsePositiveInt)
    .action(async (options: IngestCommandOptions) => {
      await runIngestCommand(options);
    });

  program
    .command("search")
    .description("Query stored chunks by similarity.")
    .argument("<query>", "search text")
    .addOption(new Option("--category <category>", "restrict to a category").choices(["forum", "repository"]))
    .option("--tag <tag>", "match chunks carrying this tag (repeatable)", collect, [])
    .option("--from <date>", "earliest created_at (ISO-8601)")
    .option("--to <date>", "latest created_at (ISO-8601)")
    .option("--top-k <n>", "maximum hits", parsePositiveInt, 5)
    .action(async (query: string, options: SearchCommandOptions) => {
      await runSearchCommand(query, options);
    });

  return program;
}

async function runIngestCommand(options: IngestCommandOptions): Promise<void> {
  const runtime = await bootstrap(loadConfig());
  const controller = new AbortController();
  const onSigint = () => {
    logger.warn("interrupt received; finishing in-flight files");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const summary = await runIngestion(runtime, {
      source: options.source,
      file: options.file,
      dataDir: options.dataDir,
      dryRun: options.dryRun,
      concurrency: options.concurrency,
      signal: controller.signal,
    });

    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    if (summary.error_count > 0) {
      process.stderr.write(
        `Ingestion completed with ${summary.error_count} error(s); see failures in the summary.\n`,
      );
    }
  } finally {
    process.off("SIGINT", onSigint);
    await runtime.close();
  }
}

async function runSearchCommand(query: string, options: SearchCommandOptions): Promise<void> {
  const runtime = await bootstrap(loadConfig());
  try {
    const hits = await searchChunks(runtime, {
      query,
      category: options.category,
      tags: options.tag.length > 0 ? options.tag : undefined,
      createdFrom: options.from,
      createdTo: options.to,
      topK: options.topK,
    });
    process.stdout.write(`${JSON.stringify({ query, hits }, null, 2)}\n`);
  } finally {
    await runtime.close();
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const fatal = error instanceof ConfigurationError ? "configuration error" : "ingestion aborted";
  logger.fatal({ err: describeError(error) }, fatal);
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(1);
});
