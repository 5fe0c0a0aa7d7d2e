import { MissingCredentialError } from "../../domain/errors.js";
import { CompletionRequest, EmbeddingProvider, LlmClient } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  chatModel: string;
  baseUrl?: string;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

interface ChatResponse {
  choices: Array<{
    message: {
      content: string | null;
    };
  }>;
}

const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export class OpenAiClient implements LlmClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl()}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as EmbeddingResponse;
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async complete({ system, prompt, maxTokens }: CompletionRequest): Promise<string> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl()}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: 0.2,
        max_tokens: maxTokens,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as ChatResponse;
    return data.choices[0]?.message?.content?.trim() ?? "";
  }

  private baseUrl(): string {
    return this.options.baseUrl ?? DEFAULT_BASE_URL;
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new MissingCredentialError("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly version: string;

  constructor(
    private readonly client: OpenAiClient,
    model: string,
  ) {
    this.version = `openai:${model}`;
  }

  embedTexts(texts: string[]): Promise<number[][]> {
    return this.client.embedTexts(texts);
  }
}
