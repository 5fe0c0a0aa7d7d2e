import { CompletionRequest, EmbeddingProvider, LlmClient } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

interface OllamaEmbeddingsResponse {
  embedding?: number[];
}

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
}

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements LlmClient, EmbeddingProvider {
  readonly version: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.version = `ollama:${options.embeddingModel}`;
  }

  // Local server, no credential to check.
  isConfigured(): boolean {
    return true;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaEmbeddingsResponse;
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async complete({ system, prompt, maxTokens }: CompletionRequest): Promise<string> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.2,
          num_predict: maxTokens,
        },
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaChatResponse;
    return data.message?.content?.trim() ?? "";
  }
}
