import { isRetryableError } from "../domain/errors.js";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Bounded retry with exponential backoff. One instance is shared by every
 * embedding and vector store call of a run.
 */
export class RetryPolicy {
  readonly maxAttempts: number;

  private readonly factor: number;

  private readonly shouldRetry: (error: unknown) => boolean;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer.");
    }
    this.maxAttempts = options.maxAttempts;
    this.factor = options.factor ?? 2;
    this.shouldRetry = options.shouldRetry ?? isRetryableError;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Delay before retry number `attempt` (1-based). */
  delayFor(attempt: number): number {
    const raw = this.options.baseDelayMs * this.factor ** (attempt - 1);
    return Math.min(raw, this.options.maxDelayMs);
  }

  schedule(): number[] {
    return Array.from({ length: this.maxAttempts - 1 }, (_, index) =>
      this.delayFor(index + 1),
    );
  }

  async execute<T>(
    task: (attempt: number) => Promise<T>,
    onRetry?: (info: RetryAttemptInfo) => void,
  ): Promise<T> {
    let attempt = 1;
    while (true) {
      try {
        return await task(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.shouldRetry(error)) {
          throw error;
        }
        const delayMs = this.delayFor(attempt);
        onRetry?.({ attempt, delayMs, error });
        await this.sleep(delayMs);
        attempt += 1;
      }
    }
  }
}
