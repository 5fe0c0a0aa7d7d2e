import { EmbeddingMismatchError, UpstreamDataError } from "../../domain/errors.js";
import { Chunk, IndexedVector, RetrievalHit } from "../../domain/types.js";
import {
  INDEX_BATCH_SIZE,
  IndexChunksOptions,
  IndexChunksResult,
  MetadataFilter,
  QueryInput,
  VectorStore,
} from "../../domain/vectorStore.js";
import { cosineDistance } from "../../utils/vector.js";
import { EmbeddingProvider } from "../ai/types.js";

export interface InMemoryVectorStoreSnapshot {
  embeddingVersion: string | null;
  vectors: IndexedVector[];
}

export class InMemoryVectorStore implements VectorStore {
  protected vectorsById = new Map<string, IndexedVector>();

  protected currentEmbeddingVersion: string | null = null;

  async indexChunks(
    chunks: Chunk[],
    embedder: EmbeddingProvider,
    options: IndexChunksOptions = {},
  ): Promise<IndexChunksResult> {
    assertUniqueChunkIds(chunks);
    const books = [...new Set(chunks.map((chunk) => chunk.book))];
    const batchSize = Math.max(1, options.batchSize ?? INDEX_BATCH_SIZE);

    const prepared: IndexedVector[] = [];
    for (let start = 0; start < chunks.length; start += batchSize) {
      const batch = chunks.slice(start, start + batchSize);
      const embeddings = await embedder.embedTexts(batch.map((chunk) => chunk.text));
      if (embeddings.length !== batch.length) {
        throw new Error(
          `Embedding count mismatch (${embeddings.length} vectors for ${batch.length} chunks).`,
        );
      }

      batch.forEach((chunk, offset) => {
        prepared.push(toIndexedVector(chunk, embeddings[offset]));
      });
      options.onProgress?.({ indexed: prepared.length, total: chunks.length });
    }

    assertSingleDimension(prepared);
    const otherBooksCount = this.countOutsideBooks(books);
    if (otherBooksCount > 0 && this.currentEmbeddingVersion !== embedder.version) {
      throw new EmbeddingMismatchError(
        this.currentEmbeddingVersion ?? "unknown",
        embedder.version,
      );
    }

    const cleared = this.deleteBooks(books);
    for (const vector of prepared) {
      this.vectorsById.set(vector.chunk_id, vector);
    }
    this.currentEmbeddingVersion =
      this.vectorsById.size > 0 ? embedder.version : null;

    return { indexed: prepared.length, cleared, books };
  }

  async query({ embedding, topK, filter }: QueryInput): Promise<RetrievalHit[]> {
    const limit = Math.max(0, Math.floor(topK));
    if (limit === 0) {
      return [];
    }

    const hits: RetrievalHit[] = [];
    for (const vector of this.vectorsById.values()) {
      if (!matchesFilter(vector, filter)) {
        continue;
      }
      hits.push({
        text: vector.document_text,
        chunk_id: vector.chunk_id,
        verse_number: vector.metadata.verse_number,
        section: vector.metadata.section,
        source_uri: vector.metadata.source_uri,
        distance: cosineDistance(embedding, vector.embedding),
      });
    }

    return hits
      .sort((a, b) => a.distance - b.distance || a.chunk_id.localeCompare(b.chunk_id))
      .slice(0, limit);
  }

  async collectionSize(): Promise<number> {
    return this.vectorsById.size;
  }

  async embeddingVersion(): Promise<string | null> {
    return this.currentEmbeddingVersion;
  }

  protected exportSnapshot(): InMemoryVectorStoreSnapshot {
    return {
      embeddingVersion: this.currentEmbeddingVersion,
      vectors: [...this.vectorsById.values()].map((vector) => ({
        ...vector,
        metadata: { ...vector.metadata },
      })),
    };
  }

  protected importSnapshot(snapshot: InMemoryVectorStoreSnapshot): void {
    this.vectorsById.clear();
    for (const vector of snapshot.vectors) {
      this.vectorsById.set(vector.chunk_id, { ...vector, metadata: { ...vector.metadata } });
    }
    this.currentEmbeddingVersion =
      this.vectorsById.size > 0 ? snapshot.embeddingVersion : null;
  }

  private countOutsideBooks(books: string[]): number {
    const targets = new Set(books);
    let count = 0;
    for (const vector of this.vectorsById.values()) {
      if (!targets.has(vector.metadata.book)) {
        count += 1;
      }
    }
    return count;
  }

  private deleteBooks(books: string[]): number {
    const targets = new Set(books);
    let cleared = 0;
    for (const [chunkId, vector] of this.vectorsById) {
      if (targets.has(vector.metadata.book)) {
        this.vectorsById.delete(chunkId);
        cleared += 1;
      }
    }
    return cleared;
  }
}

function toIndexedVector(chunk: Chunk, embedding: number[]): IndexedVector {
  return {
    chunk_id: chunk.chunk_id,
    embedding,
    document_text: chunk.text,
    metadata: {
      parent_id: chunk.parent_id,
      book: chunk.book,
      verse_number: chunk.verse_number,
      section: chunk.section,
      source_uri: chunk.source_uri,
    },
  };
}

function matchesFilter(vector: IndexedVector, filter?: MetadataFilter): boolean {
  if (!filter) {
    return true;
  }
  if (filter.book !== undefined && vector.metadata.book !== filter.book) {
    return false;
  }
  if (filter.verse_number !== undefined && vector.metadata.verse_number !== filter.verse_number) {
    return false;
  }
  if (filter.section !== undefined && vector.metadata.section !== filter.section) {
    return false;
  }
  return true;
}

function assertUniqueChunkIds(chunks: Chunk[]): void {
  const seen = new Set<string>();
  for (const chunk of chunks) {
    if (seen.has(chunk.chunk_id)) {
      throw new UpstreamDataError(
        `Duplicate chunk_id "${chunk.chunk_id}" in index input. Re-run the chunk stage.`,
      );
    }
    seen.add(chunk.chunk_id);
  }
}

function assertSingleDimension(vectors: IndexedVector[]): void {
  if (vectors.length === 0) {
    return;
  }
  const dimension = vectors[0].embedding.length;
  for (const vector of vectors) {
    if (vector.embedding.length !== dimension || dimension === 0) {
      throw new Error(
        `Embedding dimension mismatch for ${vector.chunk_id} (${vector.embedding.length} vs ${dimension}).`,
      );
    }
  }
}
