import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fileExists } from "../src/infra/files/fileStore.js";
import { PersistentVectorStore } from "../src/infra/store/persistentVectorStore.js";
import { KeywordEmbeddingProvider, makeChunk } from "./support/stubs.js";

describe("PersistentVectorStore", () => {
  let tempDir: string;
  let indexFile: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "verse-notes-index-"));
    indexFile = path.join(tempDir, "index", "noi-index.json");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("restores indexed vectors after restart", async () => {
    const embedder = new KeywordEmbeddingProvider(["tongue"]);
    const first = new PersistentVectorStore(indexFile, { maxBytes: 1_000_000 });
    await first.initialize();
    await first.indexChunks([makeChunk("NOI-1-purport", "control of the tongue")], embedder);
    await first.close();

    const second = new PersistentVectorStore(indexFile, { maxBytes: 1_000_000 });
    await second.initialize();

    expect(await second.collectionSize()).toBe(1);
    expect(await second.embeddingVersion()).toBe("keyword-v1");
    const hits = await second.query({ embedding: [1, 0], topK: 3 });
    expect(hits.map((hit) => [hit.chunk_id, hit.distance])).toEqual([["NOI-1-purport", 0]]);
  });

  it("picks up an index written by another instance", async () => {
    const reader = new PersistentVectorStore(indexFile, { maxBytes: 1_000_000 });
    await reader.initialize();
    expect(await reader.collectionSize()).toBe(0);

    const writer = new PersistentVectorStore(indexFile, { maxBytes: 1_000_000 });
    await writer.indexChunks(
      [makeChunk("NOI-1-purport", "first"), makeChunk("NOI-2-purport", "second")],
      new KeywordEmbeddingProvider(["tongue"]),
    );
    await writer.close();

    expect(await reader.collectionSize()).toBe(2);
  });

  it("enforces the size limit", async () => {
    const store = new PersistentVectorStore(indexFile, { maxBytes: 120 });
    await store.initialize();

    await expect(
      store.indexChunks(
        [makeChunk("NOI-1-purport", "x".repeat(500))],
        new KeywordEmbeddingProvider(["tongue"]),
      ),
    ).rejects.toThrow("Vector index snapshot exceeds size limit");
  });

  it("keeps the previous collection when the snapshot cannot be saved", async () => {
    const store = new PersistentVectorStore(indexFile, { maxBytes: 120 });
    await store.initialize();

    await expect(
      store.indexChunks(
        [makeChunk("NOI-1-purport", "x".repeat(500))],
        new KeywordEmbeddingProvider(["tongue"]),
      ),
    ).rejects.toThrow("Vector index snapshot exceeds size limit");

    expect(await store.collectionSize()).toBe(0);
    expect(await store.embeddingVersion()).toBeNull();
    await expect(fileExists(indexFile)).resolves.toBe(false);
  });

  it("rejects snapshots it cannot read", async () => {
    await fs.mkdir(path.dirname(indexFile), { recursive: true });

    await fs.writeFile(indexFile, "{}", "utf-8");
    await expect(
      new PersistentVectorStore(indexFile, { maxBytes: 1_000_000 }).initialize(),
    ).rejects.toThrow("Invalid vector index snapshot format.");

    await fs.writeFile(
      indexFile,
      JSON.stringify({
        format_version: 2,
        saved_at: "2026-01-01T00:00:00.000Z",
        snapshot: { embeddingVersion: null, vectors: [] },
      }),
      "utf-8",
    );
    await expect(
      new PersistentVectorStore(indexFile, { maxBytes: 1_000_000 }).initialize(),
    ).rejects.toThrow("Unsupported vector index format version: 2. Expected 1.");
  });
});
