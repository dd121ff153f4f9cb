import type { AppConfig } from "../../config/env.js";
import { OllamaEmbeddingClient } from "./ollamaClient.js";
import { OpenAiEmbeddingClient } from "./openAiClient.js";
import type { EmbeddingClient } from "./types.js";

export function createEmbeddingClient(config: AppConfig): EmbeddingClient {
  if (config.embeddingProvider === "openai") {
    return new OpenAiEmbeddingClient({
      apiKey: config.openaiApiKey,
      embeddingModel: config.openaiEmbeddingModel,
    });
  }
  return new OllamaEmbeddingClient({
    baseUrl: config.ollamaBaseUrl,
    embeddingModel: config.ollamaEmbeddingModel,
  });
}
