import { describe, expect, it } from "vitest";
import { EmbeddingMismatchError, UpstreamDataError } from "../src/domain/errors.js";
import { IndexProgress } from "../src/domain/vectorStore.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { KeywordEmbeddingProvider, makeChunk } from "./support/stubs.js";

describe("InMemoryVectorStore", () => {
  it("embeds in batches and reports progress", async () => {
    const embedder = new KeywordEmbeddingProvider(["tongue"]);
    const store = new InMemoryVectorStore();
    const progress: IndexProgress[] = [];

    const chunks = ["a", "b", "c", "d", "e"].map((id) =>
      makeChunk(`NOI-${id}`, `chunk text ${id} about the tongue`),
    );
    const result = await store.indexChunks(chunks, embedder, {
      batchSize: 2,
      onProgress: (update) => progress.push(update),
    });

    expect(result).toEqual({ indexed: 5, cleared: 0, books: ["NOI"] });
    expect(embedder.calls.map((batch) => batch.length)).toEqual([2, 2, 1]);
    expect(progress).toEqual([
      { indexed: 2, total: 5 },
      { indexed: 4, total: 5 },
      { indexed: 5, total: 5 },
    ]);
    expect(await store.collectionSize()).toBe(5);
    expect(await store.embeddingVersion()).toBe("keyword-v1");
  });

  it("replaces every entry of a re-indexed book", async () => {
    const embedder = new KeywordEmbeddingProvider(["tongue"]);
    const store = new InMemoryVectorStore();

    await store.indexChunks(
      [makeChunk("NOI-1-purport", "old purport text"), makeChunk("NOI-2-purport", "old second")],
      embedder,
    );
    const result = await store.indexChunks(
      [makeChunk("NOI-1-purport", "new purport text")],
      embedder,
    );

    expect(result.cleared).toBe(2);
    expect(await store.collectionSize()).toBe(1);
    const hits = await store.query({ embedding: [0, 1], topK: 5 });
    expect(hits.map((hit) => hit.text)).toEqual(["new purport text"]);
  });

  it("filters on metadata before ranking", async () => {
    const embedder = new KeywordEmbeddingProvider(["tongue"]);
    const store = new InMemoryVectorStore();
    await store.indexChunks(
      [
        makeChunk("NOI-1-translation", "the tongue", { section: "translation" }),
        makeChunk("NOI-1-purport", "the tongue again"),
        makeChunk("NOI-2-purport", "something else", { verse_number: "2" }),
      ],
      embedder,
    );

    const hits = await store.query({
      embedding: [1, 0],
      topK: 5,
      filter: { verse_number: "2", book: "NOI" },
    });
    expect(hits.map((hit) => [hit.chunk_id, hit.distance])).toEqual([["NOI-2-purport", 1]]);
    await expect(store.query({ embedding: [1, 0], topK: 0 })).resolves.toEqual([]);
  });

  it("rejects duplicate chunk ids", async () => {
    const store = new InMemoryVectorStore();
    await expect(
      store.indexChunks(
        [makeChunk("NOI-1-purport", "first text"), makeChunk("NOI-1-purport", "second text")],
        new KeywordEmbeddingProvider(["tongue"]),
      ),
    ).rejects.toBeInstanceOf(UpstreamDataError);
  });

  it("refuses to mix embedding versions across books", async () => {
    const store = new InMemoryVectorStore();
    await store.indexChunks(
      [makeChunk("NOI-1-purport", "noi text")],
      new KeywordEmbeddingProvider(["tongue"], "keyword-v1"),
    );

    await expect(
      store.indexChunks(
        [makeChunk("BG-1-purport", "other book", { book: "BG" })],
        new KeywordEmbeddingProvider(["tongue"], "keyword-v2"),
      ),
    ).rejects.toBeInstanceOf(EmbeddingMismatchError);
    expect(await store.collectionSize()).toBe(1);
    expect(await store.embeddingVersion()).toBe("keyword-v1");
  });

  it("lets a full rebuild switch embedding versions", async () => {
    const store = new InMemoryVectorStore();
    await store.indexChunks(
      [makeChunk("NOI-1-purport", "noi text")],
      new KeywordEmbeddingProvider(["tongue"], "keyword-v1"),
    );
    await store.indexChunks(
      [makeChunk("NOI-1-purport", "noi text")],
      new KeywordEmbeddingProvider(["tongue"], "keyword-v2"),
    );
    expect(await store.embeddingVersion()).toBe("keyword-v2");
  });
});
