import { z } from "zod";
import { ConfigurationError, EmbeddingRequestError } from "../../domain/errors.js";
import type { EmbeddingClient, EmbedOptions } from "./types.js";
import { postJson } from "./http.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  baseUrl?: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

export class OpenAiEmbeddingClient implements EmbeddingClient {
  readonly provider = "openai";

  constructor(private readonly options: OpenAiClientOptions) {}

  async embedTexts(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const raw = await postJson(
      `${this.options.baseUrl ?? "https://api.openai.com/v1"}/embeddings`,
      {
        model: this.options.embeddingModel,
        input: texts,
      },
      { Authorization: `Bearer ${apiKey}` },
      options.signal,
      "OpenAI embeddings",
    );

    const parsed = embeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingRequestError("OpenAI embeddings returned an unexpected payload.", 502);
    }
    return parsed.data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [embedding] = await this.embedTexts([text], options);
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingRequestError("OpenAI embeddings returned an empty vector.", 502);
    }
    return embedding;
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required for OpenAI embeddings.");
    }
    return this.options.apiKey;
  }
}
