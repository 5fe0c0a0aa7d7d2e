import path from "node:path";
import { z } from "zod";

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_PROVIDER: z.enum(["hash", "openai", "ollama"]).default("hash"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  DATA_DIR: z.string().default("data"),
  NOI_SOURCE_PATH: z.string().optional(),
  TOP_K: z.coerce.number().int().positive().default(8),
  MAX_TOKENS: z.coerce.number().int().positive().default(8192),
  EXCERPT_MAX_CHARS: z.coerce.number().int().positive().default(300),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(384),
  ENABLE_PGVECTOR: z.enum(["true", "false"]).optional(),
  DATABASE_URL: z.string().optional(),
  MAX_INDEX_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
});

export type LlmProvider = "openai" | "ollama";
export type EmbeddingProviderName = "hash" | "openai" | "ollama";

export interface DataPaths {
  root: string;
  rawFile: string;
  cleanFile: string;
  chunksFile: string;
  indexFile: string;
  outputsDir: string;
  jobsDir: string;
}

export interface AppConfig {
  llmProvider: LlmProvider;
  openaiApiKey: string | null;
  openaiChatModel: string;
  embeddingModel: string;
  embeddingProvider: EmbeddingProviderName;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  sourcePath: string | null;
  topK: number;
  maxTokens: number;
  excerptMaxChars: number;
  vectorDimension: number;
  enablePgvector: boolean;
  databaseUrl: string | null;
  maxIndexBytes: number;
  paths: DataPaths;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  return {
    llmProvider: parsed.LLM_PROVIDER,
    openaiApiKey: parsed.OPENAI_API_KEY?.trim() || null,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    sourcePath: parsed.NOI_SOURCE_PATH?.trim() || null,
    topK: parsed.TOP_K,
    maxTokens: parsed.MAX_TOKENS,
    excerptMaxChars: parsed.EXCERPT_MAX_CHARS,
    vectorDimension: parsed.VECTOR_DIMENSION,
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    maxIndexBytes: parsed.MAX_INDEX_BYTES,
    paths: resolveDataPaths(parsed.DATA_DIR),
  };
}

export function resolveDataPaths(dataDir: string): DataPaths {
  const root = path.resolve(dataDir);
  const outputsDir = path.join(root, "outputs");
  return {
    root,
    rawFile: path.join(root, "raw", "noi", "noi_raw.json"),
    cleanFile: path.join(root, "clean", "noi_clean.jsonl"),
    chunksFile: path.join(root, "chunks", "noi_chunks.jsonl"),
    indexFile: path.join(root, "index", "noi-index.json"),
    outputsDir,
    jobsDir: path.join(outputsDir, "jobs"),
  };
}
