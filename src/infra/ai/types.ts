export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
}

export interface LlmClient {
  /** False when the provider needs a credential that is not configured. */
  isConfigured(): boolean;
  complete(request: CompletionRequest): Promise<string>;
}

export interface EmbeddingProvider {
  /** Identifies the embedding function; vectors from different versions are not comparable. */
  readonly version: string;
  embedTexts(texts: string[]): Promise<number[][]>;
}
