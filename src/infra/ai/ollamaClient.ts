import { z } from "zod";
import { EmbeddingRequestError } from "../../domain/errors.js";
import type { EmbeddingClient, EmbedOptions } from "./types.js";
import { postJson } from "./http.js";

interface OllamaClientOptions {
  baseUrl: string;
  embeddingModel: string;
}

const ollamaEmbeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

export class OllamaEmbeddingClient implements EmbeddingClient {
  readonly provider = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const raw = await postJson(
      `${this.options.baseUrl}/api/embeddings`,
      {
        model: this.options.embeddingModel,
        prompt: text,
      },
      {},
      options.signal,
      "Ollama embeddings",
    );

    const parsed = ollamaEmbeddingsResponseSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.embedding || parsed.data.embedding.length === 0) {
      throw new EmbeddingRequestError("Ollama embeddings returned empty vector.", 502);
    }
    return parsed.data.embedding;
  }
}
