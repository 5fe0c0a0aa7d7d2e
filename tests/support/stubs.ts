import { Chunk, ChunkSection } from "../../src/domain/types.js";
import { CompletionRequest, EmbeddingProvider, LlmClient } from "../../src/infra/ai/types.js";

/** Maps each text to a one-hot vector chosen by the first keyword it contains. */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(
    private readonly keywords: string[],
    readonly version = "keyword-v1",
  ) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((text) => {
      const vector = new Array<number>(this.keywords.length + 1).fill(0);
      const index = this.keywords.findIndex((keyword) => text.toLowerCase().includes(keyword));
      vector[index === -1 ? this.keywords.length : index] = 1;
      return vector;
    });
  }
}

export class ScriptedLlmClient implements LlmClient {
  readonly requests: CompletionRequest[] = [];

  constructor(
    private readonly replies: Array<string | Error>,
    private readonly configured = true,
  ) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies[this.requests.length - 1];
    if (reply === undefined) {
      throw new Error("No scripted reply left.");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function makeChunk(
  chunkId: string,
  text: string,
  overrides: Partial<Pick<Chunk, "book" | "verse_number" | "section">> = {},
): Chunk {
  const book = overrides.book ?? "NOI";
  const verseNumber = overrides.verse_number ?? "1";
  const section: ChunkSection = overrides.section ?? "purport";
  return {
    chunk_id: chunkId,
    parent_id: `${book}-${verseNumber}`,
    book,
    verse_number: verseNumber,
    section,
    text,
    source_uri: `https://example.org/${book.toLowerCase()}/${verseNumber}/`,
  };
}
