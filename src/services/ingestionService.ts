import path from "node:path";
import type { AppRuntime } from "../bootstrap.js";
import type { IngestionSummary } from "../domain/types.js";
import { resolveSourceFiles, type SourceSelection } from "../infra/sources/sourceFileLoader.js";
import { IngestionOrchestrator } from "./ingestionOrchestrator.js";

export interface IngestRequest {
  source: SourceSelection;
  /** Single-file override; `source` is ignored when set. */
  file?: string;
  dataDir?: string;
  dryRun?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
}

export function createOrchestrator(
  runtime: AppRuntime,
  overrides: { dryRun?: boolean; concurrency?: number } = {},
): IngestionOrchestrator {
  const { config } = runtime;
  return new IngestionOrchestrator(
    {
      vectorStore: runtime.vectorStore,
      embeddingClient: runtime.embeddingClient,
      dedupIndex: runtime.dedupIndex,
      retryPolicy: runtime.retryPolicy,
      logger: runtime.logger,
    },
    {
      maxChars: config.chunkMaxChars,
      overlapChars: config.chunkOverlapChars,
      concurrency: overrides.concurrency ?? config.concurrency,
      dryRun: overrides.dryRun ?? false,
      embedTimeoutMs: config.embedTimeoutMs,
      storeTimeoutMs: config.storeTimeoutMs,
      minForumScore: config.minForumScore,
      minContentLength: config.minContentLength,
    },
  );
}

export async function runIngestion(
  runtime: AppRuntime,
  request: IngestRequest,
): Promise<IngestionSummary> {
  const files = request.file
    ? [path.resolve(request.file)]
    : await resolveSourceFiles(request.dataDir ?? runtime.config.dataDir, request.source);

  if (files.length === 0) {
    runtime.logger.warn(
      { source: request.source, data_dir: request.dataDir ?? runtime.config.dataDir },
      "no source files found",
    );
  }

  const orchestrator = createOrchestrator(runtime, {
    dryRun: request.dryRun,
    concurrency: request.concurrency,
  });
  return orchestrator.ingestFiles(files, { signal: request.signal });
}
