import { EmbeddingMismatchError } from "../domain/errors.js";
import { PREFACE_VERSE, RetrievalHit } from "../domain/types.js";
import { MetadataFilter, VectorStore } from "../domain/vectorStore.js";
import { EmbeddingProvider } from "../infra/ai/types.js";
import { truncate } from "../utils/text.js";

export const DEFAULT_CONTEXT_CHARS_PER_CHUNK = 600;

export class Retriever {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly vectorStore: VectorStore,
    private readonly defaultTopK: number,
  ) {}

  /** Most relevant chunks first. Empty when nothing is indexed. */
  async retrieve(
    query: string,
    topK: number = this.defaultTopK,
    filter?: MetadataFilter,
  ): Promise<RetrievalHit[]> {
    const indexedVersion = await this.vectorStore.embeddingVersion();
    if (indexedVersion !== null && indexedVersion !== this.embedder.version) {
      throw new EmbeddingMismatchError(indexedVersion, this.embedder.version);
    }

    const [embedding] = await this.embedder.embedTexts([query]);
    if (!embedding || embedding.length === 0) {
      throw new Error("Embedding provider returned no vector for the query.");
    }

    return this.vectorStore.query({ embedding, topK, filter });
  }
}

export function formatContext(
  hits: RetrievalHit[],
  maxCharsPerChunk: number = DEFAULT_CONTEXT_CHARS_PER_CHUNK,
): string {
  return hits
    .map((hit) => {
      const label =
        hit.verse_number === PREFACE_VERSE
          ? "NOI Preface"
          : `NOI ${hit.verse_number}`.toUpperCase();
      return [
        `[${label} - ${hit.section}]`,
        `Source: ${hit.source_uri}`,
        truncate(hit.text, maxCharsPerChunk),
      ].join("\n");
    })
    .join("\n\n---\n\n");
}

export function relevancePercent(hit: Pick<RetrievalHit, "distance">): number {
  const relevance = Math.min(1, Math.max(0, 1 - hit.distance));
  return Math.round(relevance * 100);
}
