import { AppConfig } from "../../config/env.js";
import { HashEmbeddingProvider } from "./hashEmbedding.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient, OpenAiEmbeddingProvider } from "./openAiClient.js";
import { EmbeddingProvider, LlmClient } from "./types.js";

export interface AiClients {
  llm: LlmClient;
  embedder: EmbeddingProvider;
}

/**
 * Defers construction of the wrapped provider to the first embedding call and
 * keeps it for the lifetime of the owner.
 */
export class LazyEmbeddingProvider implements EmbeddingProvider {
  private instance: EmbeddingProvider | null = null;

  constructor(
    readonly version: string,
    private readonly factory: () => EmbeddingProvider,
  ) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return this.resolve().embedTexts(texts);
  }

  isInitialized(): boolean {
    return this.instance !== null;
  }

  private resolve(): EmbeddingProvider {
    if (!this.instance) {
      this.instance = this.factory();
      if (this.instance.version !== this.version) {
        throw new Error(
          `Embedding provider version mismatch (${this.instance.version} vs ${this.version}).`,
        );
      }
    }
    return this.instance;
  }
}

export function createAiClients(config: AppConfig): AiClients {
  const openAi = new OpenAiClient({
    apiKey: config.openaiApiKey,
    embeddingModel: config.embeddingModel,
    chatModel: config.openaiChatModel,
  });
  const ollama = new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
  });

  return {
    llm: config.llmProvider === "openai" ? openAi : ollama,
    embedder: createEmbeddingProvider(config, openAi, ollama),
  };
}

function createEmbeddingProvider(
  config: AppConfig,
  openAi: OpenAiClient,
  ollama: OllamaClient,
): EmbeddingProvider {
  switch (config.embeddingProvider) {
    case "openai":
      return new LazyEmbeddingProvider(
        `openai:${config.embeddingModel}`,
        () => new OpenAiEmbeddingProvider(openAi, config.embeddingModel),
      );
    case "ollama":
      return new LazyEmbeddingProvider(ollama.version, () => ollama);
    case "hash":
      return new LazyEmbeddingProvider(
        `hash-v1:${config.vectorDimension}`,
        () => new HashEmbeddingProvider(config.vectorDimension),
      );
  }
}
