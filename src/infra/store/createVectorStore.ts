import { AppConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { PersistentVectorStore } from "./persistentVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export interface VectorStoreBootstrapResult {
  vectorStore: VectorStore;
  close: () => Promise<void>;
}

export async function createVectorStore(
  config: AppConfig,
): Promise<VectorStoreBootstrapResult> {
  if (!config.enablePgvector) {
    const vectorStore = new PersistentVectorStore(config.paths.indexFile, {
      maxBytes: config.maxIndexBytes,
    });
    await vectorStore.initialize();
    return {
      vectorStore,
      close: async () => {
        await vectorStore.close();
      },
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const vectorStore = new PgVectorStore(pool, config.vectorDimension);
  await vectorStore.initialize();

  return {
    vectorStore,
    close: async () => {
      await pool.end();
    },
  };
}
