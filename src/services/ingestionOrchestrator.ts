import pLimit from "p-limit";
import type { DedupIndex } from "../domain/dedupIndex.js";
import {
  EmbeddingTimeoutError,
  VectorStoreWriteError,
  describeError,
} from "../domain/errors.js";
import type {
  Chunk,
  Document,
  FailureStage,
  IngestionSummary,
  RecordState,
  SourceFile,
  SourceType,
} from "../domain/types.js";
import type { VectorStore } from "../domain/vectorStore.js";
import type { EmbeddingClient } from "../infra/ai/types.js";
import type { Logger } from "../infra/logging/logger.js";
import { loadSourceFile } from "../infra/sources/sourceFileLoader.js";
import { chunkText, DEFAULT_MAX_CHARS, DEFAULT_OVERLAP_CHARS } from "../pipelines/chunking.js";
import { DedupGuard, computeContentHash } from "../pipelines/dedup.js";
import { enrichChunk, toStoredPayload } from "../pipelines/enrichment.js";
import { DEFAULT_KEYWORD_COUNT } from "../pipelines/keywords.js";
import { describeRecord, expandRecord, normalizeRecord } from "../pipelines/normalizer.js";
import type { RetryAttemptInfo, RetryPolicy } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";

export interface IngestionDependencies {
  vectorStore: VectorStore;
  embeddingClient: EmbeddingClient;
  dedupIndex: DedupIndex;
  retryPolicy: RetryPolicy;
  logger: Logger;
}

export interface IngestionOptions {
  maxChars: number;
  overlapChars: number;
  concurrency: number;
  dryRun: boolean;
  embedTimeoutMs: number;
  storeTimeoutMs: number;
  keywordCount: number;
  /** Forum posts scoring below this are filtered out; null disables the filter. */
  minForumScore: number | null;
  minContentLength: number;
}

export const DEFAULT_INGESTION_OPTIONS: IngestionOptions = {
  maxChars: DEFAULT_MAX_CHARS,
  overlapChars: DEFAULT_OVERLAP_CHARS,
  concurrency: 2,
  dryRun: false,
  embedTimeoutMs: 30_000,
  storeTimeoutMs: 15_000,
  keywordCount: DEFAULT_KEYWORD_COUNT,
  minForumScore: null,
  minContentLength: 0,
};

export interface IngestFilesOptions {
  /** Aborting stops scheduling new files; files already started finish. */
  signal?: AbortSignal;
}

type ChunkOutcome = "stored" | "duplicate" | "failed";

interface IngestionRun {
  summary: IngestionSummary;
  guard: DedupGuard;
}

export class IngestionOrchestrator {
  private readonly options: IngestionOptions;

  constructor(
    private readonly deps: IngestionDependencies,
    options: Partial<IngestionOptions> = {},
  ) {
    this.options = { ...DEFAULT_INGESTION_OPTIONS, ...options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new RangeError("concurrency must be a positive integer.");
    }
  }

  async ingestFiles(
    filePaths: readonly string[],
    { signal }: IngestFilesOptions = {},
  ): Promise<IngestionSummary> {
    const run = this.startRun();
    const limit = pLimit(this.options.concurrency);
    this.deps.logger.info(
      { files: filePaths.length, dry_run: this.options.dryRun, concurrency: this.options.concurrency },
      "ingestion started",
    );

    await Promise.all(
      filePaths.map((filePath) =>
        limit(async () => {
          if (signal?.aborted) {
            run.summary.cancelled = true;
            return;
          }
          await this.processFile(run, filePath);
        }),
      ),
    );

    return this.finishRun(run);
  }

  async ingestRecords(
    sourceType: SourceType,
    records: readonly unknown[],
    label = "inline",
  ): Promise<IngestionSummary> {
    const run = this.startRun();
    await this.processRecords(
      run,
      sourceType,
      records,
      null,
      this.deps.logger.child({ file: label }),
    );
    return this.finishRun(run);
  }

  private startRun(): IngestionRun {
    return {
      summary: {
        dry_run: this.options.dryRun,
        cancelled: false,
        file_count: 0,
        record_count: 0,
        processed_count: 0,
        chunk_count: 0,
        stored_count: 0,
        duplicate_count: 0,
        filtered_count: 0,
        oversized_count: 0,
        error_count: 0,
        per_category_counts: {},
        failures: [],
      },
      guard: new DedupGuard(this.deps.dedupIndex, { persist: !this.options.dryRun }),
    };
  }

  private finishRun(run: IngestionRun): IngestionSummary {
    const { failures, ...counts } = run.summary;
    if (failures.length > 0) {
      this.deps.logger.warn({ ...counts, failures: failures.length }, "ingestion finished with errors");
    } else {
      this.deps.logger.info(counts, "ingestion finished");
    }
    return run.summary;
  }

  private async processFile(run: IngestionRun, filePath: string): Promise<void> {
    run.summary.file_count += 1;
    const logger = this.deps.logger.child({ file: filePath });

    let sourceFile: SourceFile;
    try {
      sourceFile = await loadSourceFile(filePath);
    } catch (error) {
      this.recordFailure(run, logger, filePath, "load", error);
      return;
    }

    logger.info(
      { source_type: sourceFile.sourceType, records: sourceFile.records.length },
      "processing source file",
    );
    await this.processRecords(run, sourceFile.sourceType, sourceFile.records, filePath, logger);
  }

  private async processRecords(
    run: IngestionRun,
    sourceType: SourceType,
    records: readonly unknown[],
    sourceFile: string | null,
    logger: Logger,
  ): Promise<void> {
    for (const [position, raw] of records.entries()) {
      const state = await this.processRecord(run, sourceType, raw, position, sourceFile, logger);
      if (state === "FILTERED") {
        continue;
      }
      // Nested records go right after their parent.
      for (const [childPosition, child] of expandRecord(raw, sourceType).entries()) {
        await this.processRecord(
          run,
          child.sourceType,
          child.raw,
          childPosition,
          sourceFile,
          logger,
        );
      }
    }
  }

  private async processRecord(
    run: IngestionRun,
    sourceType: SourceType,
    raw: unknown,
    position: number,
    sourceFile: string | null,
    logger: Logger,
  ): Promise<RecordState> {
    run.summary.record_count += 1;

    const normalized = normalizeRecord(raw, sourceType);
    if (!normalized.ok) {
      this.recordFailure(
        run,
        logger,
        describeRecord(raw, sourceType, position),
        "normalize",
        normalized.error,
      );
      return "FAILED";
    }

    const document = normalized.document;
    const recordLogger = logger.child({ source_id: document.sourceId });

    const filteredBy = this.qualityFilter(document);
    if (filteredBy) {
      run.summary.filtered_count += 1;
      recordLogger.debug({ filter: filteredBy }, "record filtered");
      return "FILTERED";
    }
    let state: RecordState = "NORMALIZED";

    let chunks: Chunk[];
    try {
      chunks = this.buildChunks(document);
    } catch (error) {
      this.recordFailure(run, recordLogger, document.sourceId, "chunk", error);
      return "FAILED";
    }
    state = "CHUNKED";
    run.summary.chunk_count += chunks.length;
    run.summary.oversized_count += chunks.filter((chunk) => chunk.oversized).length;

    const outcomes: ChunkOutcome[] = [];
    for (const chunk of chunks) {
      outcomes.push(
        await this.processChunk(run, document, chunk, chunks.length, sourceFile, recordLogger),
      );
    }

    if (outcomes.includes("failed")) {
      state = "FAILED";
    } else if (outcomes.includes("stored")) {
      state = "STORED";
      run.summary.processed_count += 1;
    } else {
      state = outcomes.length > 0 ? "DEDUP_SKIPPED" : state;
      run.summary.processed_count += 1;
    }

    recordLogger.debug({ state, chunks: chunks.length }, "record finished");
    return state;
  }

  private qualityFilter(document: Document): "score" | "length" | null {
    const { minForumScore, minContentLength } = this.options;
    if (
      minForumScore !== null &&
      document.sourceType === "forum_post" &&
      document.score < minForumScore
    ) {
      return "score";
    }
    return document.rawText.length < minContentLength ? "length" : null;
  }

  private buildChunks(document: Document): Chunk[] {
    const drafts = chunkText(document.rawText, this.options.maxChars, this.options.overlapChars)
      .filter((draft) => draft.text.trim().length > 0);

    return drafts.map((draft, index) => ({
      chunkId: `${document.sourceId}#${index}`,
      parentSourceId: document.sourceId,
      sequenceIndex: index,
      text: draft.text,
      charCount: draft.charCount,
      overlapWithPrevious: draft.overlapWithPrevious,
      overlapLength: draft.overlapLength,
      oversized: draft.oversized,
      contentHash: computeContentHash(draft.text),
    }));
  }

  private async processChunk(
    run: IngestionRun,
    document: Document,
    chunk: Chunk,
    totalChunks: number,
    sourceFile: string | null,
    logger: Logger,
  ): Promise<ChunkOutcome> {
    const claimed = await run.guard.claim(chunk.contentHash);
    if (!claimed) {
      run.summary.duplicate_count += 1;
      logger.debug({ chunk_id: chunk.chunkId, content_hash: chunk.contentHash }, "duplicate chunk skipped");
      return "duplicate";
    }

    let stage: FailureStage = "embed";
    try {
      const metadata = enrichChunk(chunk, document, totalChunks, {
        keywordCount: this.options.keywordCount,
        sourceFile,
      });
      const payload = toStoredPayload(chunk, metadata);
      const onRetry = this.retryLogger(logger, chunk.chunkId);

      const { embedTimeoutMs, storeTimeoutMs } = this.options;
      const vector = await this.deps.retryPolicy.execute(
        () =>
          withTimeout(
            (signal) => this.deps.embeddingClient.embed(chunk.text, { signal }),
            embedTimeoutMs,
            () => new EmbeddingTimeoutError(embedTimeoutMs),
          ),
        (info) => onRetry("embed", info),
      );

      if (!this.options.dryRun) {
        stage = "store";
        await this.deps.retryPolicy.execute(
          () =>
            withTimeout(
              () => this.deps.vectorStore.upsert(chunk.chunkId, vector, payload),
              storeTimeoutMs,
              () => new VectorStoreWriteError(`Vector store upsert timed out after ${storeTimeoutMs}ms.`),
            ),
          (info) => onRetry("store", info),
        );
      }

      stage = "dedup";
      await run.guard.commit(chunk.contentHash);

      run.summary.stored_count += 1;
      run.summary.per_category_counts[metadata.category] =
        (run.summary.per_category_counts[metadata.category] ?? 0) + 1;
      return "stored";
    } catch (error) {
      run.guard.release(chunk.contentHash);
      this.recordFailure(run, logger, chunk.chunkId, stage, error);
      return "failed";
    }
  }

  private retryLogger(logger: Logger, chunkId: string) {
    return (stage: FailureStage, { attempt, delayMs, error }: RetryAttemptInfo) => {
      logger.warn(
        { chunk_id: chunkId, stage, attempt, delay_ms: delayMs, err: describeError(error) },
        "retrying after transient failure",
      );
    };
  }

  private recordFailure(
    run: IngestionRun,
    logger: Logger,
    source: string,
    stage: FailureStage,
    error: unknown,
  ): void {
    const reason = describeError(error);
    run.summary.error_count += 1;
    run.summary.failures.push({ source, stage, reason });
    logger.warn({ source, stage, reason }, "ingestion failure");
  }
}
