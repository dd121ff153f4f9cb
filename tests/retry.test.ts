import { describe, expect, it } from "vitest";
import {
  EmbeddingRequestError,
  EmbeddingTimeoutError,
  MalformedRecordError,
  isRetryableError,
} from "../src/domain/errors.js";
import { RetryPolicy } from "../src/utils/retry.js";
import { withTimeout } from "../src/utils/timeout.js";

function recordingPolicy(maxAttempts: number) {
  const sleeps: number[] = [];
  const policy = new RetryPolicy({
    maxAttempts,
    baseDelayMs: 100,
    maxDelayMs: 1_000,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { policy, sleeps };
}

describe("RetryPolicy", () => {
  it("backs off exponentially up to the max delay", () => {
    const { policy } = recordingPolicy(6);
    expect(policy.schedule()).toEqual([100, 200, 400, 800, 1_000]);
  });

  it("retries transient failures and returns the eventual result", async () => {
    const { policy, sleeps } = recordingPolicy(3);
    const attempts: number[] = [];

    const result = await policy.execute(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) {
        throw new EmbeddingRequestError("busy", 503);
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([100, 200]);
  });

  it("gives up after max attempts with the last error", async () => {
    const { policy, sleeps } = recordingPolicy(2);
    const retries: number[] = [];

    await expect(
      policy.execute(
        async () => {
          throw new EmbeddingTimeoutError(50);
        },
        ({ attempt }) => retries.push(attempt),
      ),
    ).rejects.toBeInstanceOf(EmbeddingTimeoutError);
    expect(retries).toEqual([1]);
    expect(sleeps).toEqual([100]);
  });

  it("does not retry permanent failures", async () => {
    const { policy, sleeps } = recordingPolicy(5);
    let calls = 0;

    await expect(
      policy.execute(async () => {
        calls += 1;
        throw new EmbeddingRequestError("bad request", 400);
      }),
    ).rejects.toThrow("bad request");
    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it("rejects a non-positive attempt count", () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 1, maxDelayMs: 1 })).toThrow(
      RangeError,
    );
  });
});

describe("error taxonomy", () => {
  it("classifies retryable errors", () => {
    expect(isRetryableError(new EmbeddingTimeoutError(10))).toBe(true);
    expect(isRetryableError(new EmbeddingRequestError("network", null))).toBe(true);
    expect(isRetryableError(new EmbeddingRequestError("rate limited", 429))).toBe(true);
    expect(isRetryableError(new EmbeddingRequestError("unauthorized", 401))).toBe(false);
    expect(isRetryableError(new MalformedRecordError("forum_post", ["id: Required"]))).toBe(false);
    expect(isRetryableError(new Error("plain"))).toBe(false);
  });

  it("names errors after their class", () => {
    expect(new EmbeddingTimeoutError(10).name).toBe("EmbeddingTimeoutError");
    expect(new EmbeddingTimeoutError(10).code).toBe("EMBEDDING_TIMEOUT");
  });
});

describe("withTimeout", () => {
  it("resolves when the task finishes in time", async () => {
    await expect(
      withTimeout(async () => "done", 1_000, () => new EmbeddingTimeoutError(1_000)),
    ).resolves.toBe("done");
  });

  it("rejects with the timeout error and aborts the task signal", async () => {
    const seen: { signal?: AbortSignal } = {};

    await expect(
      withTimeout(
        (signal) => {
          seen.signal = signal;
          return new Promise<string>(() => {});
        },
        10,
        () => new EmbeddingTimeoutError(10),
      ),
    ).rejects.toThrow("Embedding request timed out after 10ms.");
    expect(seen.signal?.aborted).toBe(true);
  });
});
