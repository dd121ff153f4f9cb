import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, EmbeddingRequestError } from "../src/domain/errors.js";
import { OllamaEmbeddingClient } from "../src/infra/ai/ollamaClient.js";
import { OpenAiEmbeddingClient } from "../src/infra/ai/openAiClient.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("embedding clients", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the prompt to Ollama and returns the embedding", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ embedding: [0.1, 0.2] }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new OllamaEmbeddingClient({
      baseUrl: "http://ollama.test",
      embeddingModel: "nomic-embed-text",
    });
    await expect(client.embed("hello")).resolves.toEqual([0.1, 0.2]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ollama.test/api/embeddings");
    expect(init?.body).toBe(JSON.stringify({ model: "nomic-embed-text", prompt: "hello" }));
  });

  it("maps HTTP failures to retryable or permanent request errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("overloaded", { status: 503 })),
    );
    const client = new OllamaEmbeddingClient({ baseUrl: "http://ollama.test", embeddingModel: "m" });

    const unavailable = await client.embed("x").catch((error: unknown) => error);
    expect(unavailable).toBeInstanceOf(EmbeddingRequestError);
    expect(unavailable instanceof EmbeddingRequestError && unavailable.retryable).toBe(true);

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("bad input", { status: 400 })),
    );
    const rejected = await client.embed("x").catch((error: unknown) => error);
    expect(rejected instanceof EmbeddingRequestError && rejected.status).toBe(400);
    expect(rejected instanceof EmbeddingRequestError && rejected.retryable).toBe(false);
  });

  it("treats an empty Ollama vector as a failed request", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ embedding: [] })));
    const client = new OllamaEmbeddingClient({ baseUrl: "http://ollama.test", embeddingModel: "m" });
    await expect(client.embed("x")).rejects.toThrow("Ollama embeddings returned empty vector.");
  });

  it("treats a network error as retryable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    const client = new OllamaEmbeddingClient({ baseUrl: "http://ollama.test", embeddingModel: "m" });
    const error = await client.embed("x").catch((caught: unknown) => caught);
    expect(error instanceof EmbeddingRequestError && error.status).toBeNull();
    expect(error instanceof EmbeddingRequestError && error.retryable).toBe(true);
  });

  it("orders OpenAI embeddings by index and sends the bearer token", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({
        data: [
          { index: 1, embedding: [2, 2] },
          { index: 0, embedding: [1, 1] },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new OpenAiEmbeddingClient({
      apiKey: "test-secret",
      embeddingModel: "text-embedding-3-small",
      baseUrl: "http://openai.test/v1",
    });
    await expect(client.embedTexts(["a", "b"])).resolves.toEqual([
      [1, 1],
      [2, 2],
    ]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://openai.test/v1/embeddings");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
  });

  it("requires an OpenAI API key", async () => {
    const client = new OpenAiEmbeddingClient({ apiKey: null, embeddingModel: "m" });
    await expect(client.embed("x")).rejects.toBeInstanceOf(ConfigurationError);
  });
});
