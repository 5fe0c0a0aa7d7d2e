import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { chunkSectionSchema } from "../../domain/records.js";
import { Chunk, RetrievalHit } from "../../domain/types.js";
import {
  IndexChunksOptions,
  IndexChunksResult,
  QueryInput,
} from "../../domain/vectorStore.js";
import { EmbeddingProvider } from "../ai/types.js";
import { isFileMissing, writeFileAtomic } from "../files/fileStore.js";
import {
  InMemoryVectorStore,
  InMemoryVectorStoreSnapshot,
} from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;

const snapshotSchema = z.object({
  embeddingVersion: z.string().nullable(),
  vectors: z.array(
    z.object({
      chunk_id: z.string(),
      embedding: z.array(z.number()),
      document_text: z.string(),
      metadata: z.object({
        parent_id: z.string(),
        book: z.string(),
        verse_number: z.string(),
        section: chunkSectionSchema,
        source_uri: z.string(),
      }),
    }),
  ),
});

const persistedSchema = z.object({
  format_version: z.number(),
  saved_at: z.string(),
  snapshot: snapshotSchema,
});

type PersistedVectorStore = z.infer<typeof persistedSchema>;

export interface PersistentVectorStoreOptions {
  maxBytes: number;
}

/** JSON-file backed collection; the whole snapshot is rewritten after each index run. */
export class PersistentVectorStore extends InMemoryVectorStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  private loadedMtimeMs: number | null = null;

  constructor(
    filePath: string,
    private readonly options: PersistentVectorStoreOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.reloadFromDisk();
    this.initialized = true;
  }

  /** Picks up snapshots written by another process (e.g. the CLI index stage). */
  async refresh(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
      return;
    }
    await this.writeChain;
    const stats = await this.readStorageStat();
    if (stats.mtimeMs !== this.loadedMtimeMs) {
      await this.reloadFromDisk();
    }
  }

  async indexChunks(
    chunks: Chunk[],
    embedder: EmbeddingProvider,
    options?: IndexChunksOptions,
  ): Promise<IndexChunksResult> {
    await this.refresh();
    const previous = this.exportSnapshot();
    const result = await super.indexChunks(chunks, embedder, options);
    try {
      await this.enqueueWrite(async () => {
        await this.persistNow();
      });
    } catch (error) {
      // Memory must not report vectors the file does not hold.
      this.importSnapshot(previous);
      throw error;
    }
    return result;
  }

  async query(input: QueryInput): Promise<RetrievalHit[]> {
    await this.refresh();
    return super.query(input);
  }

  async collectionSize(): Promise<number> {
    await this.refresh();
    return super.collectionSize();
  }

  async embeddingVersion(): Promise<string | null> {
    await this.refresh();
    return super.embeddingVersion();
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task, task);
    // The caller receives the failure; later writes still queue behind it.
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedVectorStore = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Vector index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await writeFileAtomic(this.absolutePath, serialized);
    this.loadedMtimeMs = (await this.readStorageStat()).mtimeMs;
  }

  private async reloadFromDisk(): Promise<void> {
    const stats = await this.readStorageStat();
    if (!stats.exists) {
      this.importSnapshot({ embeddingVersion: null, vectors: [] });
      this.loadedMtimeMs = null;
      return;
    }

    const raw = await fs.readFile(this.absolutePath, "utf-8");
    this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
    this.loadedMtimeMs = stats.mtimeMs;
  }

  private async readStorageStat(): Promise<{
    exists: boolean;
    mtimeMs: number | null;
  }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, mtimeMs: stat.mtimeMs };
    } catch (error) {
      if (isFileMissing(error)) {
        return { exists: false, mtimeMs: null };
      }
      throw error;
    }
  }
}

function parseSnapshotFromDisk(raw: unknown): InMemoryVectorStoreSnapshot {
  const parsed = persistedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("Invalid vector index snapshot format.");
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported vector index format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data.snapshot;
}
