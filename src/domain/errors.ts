export type IngestionErrorCode =
  | "MALFORMED_RECORD"
  | "SOURCE_FILE"
  | "EMBEDDING_TIMEOUT"
  | "EMBEDDING_REQUEST"
  | "VECTOR_STORE_WRITE"
  | "CONFIGURATION";

export abstract class IngestionError extends Error {
  abstract readonly code: IngestionErrorCode;

  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedRecordError extends IngestionError {
  readonly code = "MALFORMED_RECORD";

  readonly retryable = false;

  constructor(
    readonly sourceType: string,
    readonly issues: string[],
  ) {
    super(`Malformed ${sourceType} record: ${issues.join("; ")}`);
  }
}

export class SourceFileError extends IngestionError {
  readonly code = "SOURCE_FILE";

  readonly retryable = false;

  constructor(
    readonly filePath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read source file ${filePath}: ${reason}`, options);
  }
}

export class EmbeddingTimeoutError extends IngestionError {
  readonly code = "EMBEDDING_TIMEOUT";

  readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`Embedding request timed out after ${timeoutMs}ms.`);
  }
}

export class EmbeddingRequestError extends IngestionError {
  readonly code = "EMBEDDING_REQUEST";

  readonly retryable: boolean;

  constructor(
    message: string,
    readonly status: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.retryable = status === null || status === 429 || status >= 500;
  }
}

export class VectorStoreWriteError extends IngestionError {
  readonly code = "VECTOR_STORE_WRITE";

  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options);
    this.retryable = options?.retryable ?? true;
  }
}

export class ConfigurationError extends IngestionError {
  readonly code = "CONFIGURATION";

  readonly retryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof IngestionError && error.retryable;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
