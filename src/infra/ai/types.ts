export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface EmbeddingClient {
  readonly provider: "openai" | "ollama";
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}
