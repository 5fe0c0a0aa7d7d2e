import { EmbeddingProvider } from "../infra/ai/types.js";
import { Chunk, ChunkSection, RetrievalHit } from "./types.js";

export const INDEX_BATCH_SIZE = 32;

export interface MetadataFilter {
  book?: string;
  verse_number?: string;
  section?: ChunkSection;
}

export interface QueryInput {
  embedding: number[];
  topK: number;
  filter?: MetadataFilter;
}

export interface IndexProgress {
  indexed: number;
  total: number;
}

export interface IndexChunksOptions {
  batchSize?: number;
  onProgress?: (progress: IndexProgress) => void;
}

export interface IndexChunksResult {
  indexed: number;
  cleared: number;
  books: string[];
}

export interface VectorStore {
  /** Full rebuild per book: prior entries of every book in `chunks` are removed first. */
  indexChunks(
    chunks: Chunk[],
    embedder: EmbeddingProvider,
    options?: IndexChunksOptions,
  ): Promise<IndexChunksResult>;
  query(input: QueryInput): Promise<RetrievalHit[]>;
  collectionSize(): Promise<number>;
  /** Embedding version the current entries were built with, or null when empty. */
  embeddingVersion(): Promise<string | null>;
}
