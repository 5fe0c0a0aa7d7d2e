import { Pool } from "pg";
import { EmbeddingMismatchError, UpstreamDataError } from "../../domain/errors.js";
import { Chunk, ChunkSection, RetrievalHit } from "../../domain/types.js";
import {
  INDEX_BATCH_SIZE,
  IndexChunksOptions,
  IndexChunksResult,
  QueryInput,
  VectorStore,
} from "../../domain/vectorStore.js";
import { EmbeddingProvider } from "../ai/types.js";

interface PgHitRow {
  chunk_id: string;
  content: string;
  verse_number: string;
  section: ChunkSection;
  source_uri: string;
  distance: number;
}

export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS verse_chunks (
        chunk_id TEXT PRIMARY KEY,
        parent_id TEXT NOT NULL,
        book TEXT NOT NULL,
        verse_number TEXT NOT NULL,
        section TEXT NOT NULL,
        source_uri TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding_version TEXT NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_verse_chunks_book ON verse_chunks(book)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_verse_chunks_embedding
      ON verse_chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async indexChunks(
    chunks: Chunk[],
    embedder: EmbeddingProvider,
    options: IndexChunksOptions = {},
  ): Promise<IndexChunksResult> {
    await this.initialize();
    const books = [...new Set(chunks.map((chunk) => chunk.book))];
    const batchSize = Math.max(1, options.batchSize ?? INDEX_BATCH_SIZE);

    const otherVersions = await this.pool.query<{ embedding_version: string }>(
      `SELECT DISTINCT embedding_version FROM verse_chunks WHERE NOT (book = ANY($1::text[]))`,
      [books],
    );
    const conflicting = otherVersions.rows.find(
      (row) => row.embedding_version !== embedder.version,
    );
    if (conflicting) {
      throw new EmbeddingMismatchError(conflicting.embedding_version, embedder.version);
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const deleted = await client.query(
        `DELETE FROM verse_chunks WHERE book = ANY($1::text[])`,
        [books],
      );

      let indexed = 0;
      for (let start = 0; start < chunks.length; start += batchSize) {
        const batch = chunks.slice(start, start + batchSize);
        const embeddings = await embedder.embedTexts(batch.map((chunk) => chunk.text));
        if (embeddings.length !== batch.length) {
          throw new Error(
            `Embedding count mismatch (${embeddings.length} vectors for ${batch.length} chunks).`,
          );
        }

        for (let offset = 0; offset < batch.length; offset += 1) {
          const chunk = batch[offset];
          const inserted = await client.query(
            `
              INSERT INTO verse_chunks (
                chunk_id, parent_id, book, verse_number, section,
                source_uri, content, embedding_version, embedding
              )
              VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::vector)
              ON CONFLICT (chunk_id) DO NOTHING
            `,
            [
              chunk.chunk_id,
              chunk.parent_id,
              chunk.book,
              chunk.verse_number,
              chunk.section,
              chunk.source_uri,
              chunk.text,
              embedder.version,
              toVectorLiteral(embeddings[offset]),
            ],
          );
          if (inserted.rowCount === 0) {
            throw new UpstreamDataError(
              `Duplicate chunk_id "${chunk.chunk_id}" in index input. Re-run the chunk stage.`,
            );
          }
        }

        indexed += batch.length;
        options.onProgress?.({ indexed, total: chunks.length });
      }

      await client.query("COMMIT");
      return { indexed, cleared: deleted.rowCount ?? 0, books };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async query({ embedding, topK, filter }: QueryInput): Promise<RetrievalHit[]> {
    await this.initialize();
    const result = await this.pool.query<PgHitRow>(
      `
        SELECT
          chunk_id,
          content,
          verse_number,
          section,
          source_uri,
          (embedding <=> $1::vector) AS distance
        FROM verse_chunks
        WHERE ($2::text IS NULL OR book = $2)
          AND ($3::text IS NULL OR verse_number = $3)
          AND ($4::text IS NULL OR section = $4)
        ORDER BY embedding <=> $1::vector, chunk_id
        LIMIT $5
      `,
      [
        toVectorLiteral(embedding),
        filter?.book ?? null,
        filter?.verse_number ?? null,
        filter?.section ?? null,
        Math.max(0, Math.floor(topK)),
      ],
    );

    return result.rows.map((row) => ({
      text: row.content,
      chunk_id: row.chunk_id,
      verse_number: row.verse_number,
      section: row.section,
      source_uri: row.source_uri,
      distance: Number(row.distance),
    }));
  }

  async collectionSize(): Promise<number> {
    await this.initialize();
    const result = await this.pool.query<{ count: string }>(
      "SELECT COUNT(*)::text AS count FROM verse_chunks",
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async embeddingVersion(): Promise<string | null> {
    await this.initialize();
    const result = await this.pool.query<{ embedding_version: string }>(
      "SELECT embedding_version FROM verse_chunks LIMIT 1",
    );
    return result.rows[0]?.embedding_version ?? null;
  }
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
