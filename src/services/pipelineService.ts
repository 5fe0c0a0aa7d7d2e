import { promises as fs } from "node:fs";
import path from "node:path";
import { DataPaths } from "../config/env.js";
import { UpstreamDataError } from "../domain/errors.js";
import {
  chunkSchema,
  describeIssues,
  sourcePagesSchema,
  verseRecordSchema,
} from "../domain/records.js";
import { SourcePage, VerseRecord } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingProvider } from "../infra/ai/types.js";
import {
  countJsonlRows,
  fileExists,
  isFileMissing,
  readJsonl,
  writeFileAtomic,
  writeJsonl,
} from "../infra/files/fileStore.js";
import { chunkRecords } from "../pipelines/chunking.js";
import { parsePages } from "../pipelines/parsing.js";

export interface PipelineServiceOptions {
  paths: DataPaths;
  sourcePath: string | null;
  vectorStore: VectorStore;
  embedder: EmbeddingProvider;
  log?: (message: string) => void;
}

export interface IngestResult {
  pages: number;
  source_path: string;
  raw_file: string;
}

export interface ParseResult {
  records: number;
  clean_file: string;
}

export interface ChunkResult {
  chunks: number;
  chunks_file: string;
}

export interface IndexResult {
  indexed: number;
  cleared: number;
  books: string[];
  embedding_version: string;
}

export interface PipelineStatus {
  raw_pages: number | null;
  clean_records: number | null;
  chunks: number | null;
  indexed_chunks: number;
  embedding_version: string | null;
  ready: boolean;
}

const INGEST_HINT =
  "Pass --from <file> or set NOI_SOURCE_PATH to the scraper's JSON output (an array of {id, title, url, text}).";

/**
 * Stage operations over the data directory: ingest → parse → chunk → index.
 * Each stage reads the previous stage's artifact and fully overwrites its own.
 */
export class PipelineService {
  private readonly log: (message: string) => void;

  constructor(private readonly options: PipelineServiceOptions) {
    this.log = options.log ?? ((message) => console.error(message));
  }

  async ingest(sourcePath?: string): Promise<IngestResult> {
    const source = sourcePath?.trim() || this.options.sourcePath;
    if (!source) {
      throw new UpstreamDataError(`No source pages configured. ${INGEST_HINT}`);
    }

    const absoluteSource = path.resolve(source);
    const pages = await readPagesFile(absoluteSource, INGEST_HINT);
    if (pages.length === 0) {
      throw new UpstreamDataError(`${absoluteSource} contains no pages. ${INGEST_HINT}`);
    }

    const { rawFile } = this.options.paths;
    await writeFileAtomic(rawFile, `${JSON.stringify(pages, null, 2)}\n`);
    this.log(`Ingested ${pages.length} pages → ${rawFile}`);
    return { pages: pages.length, source_path: absoluteSource, raw_file: rawFile };
  }

  async parse(): Promise<ParseResult> {
    const { rawFile, cleanFile } = this.options.paths;
    const pages = await readPagesFile(rawFile, "Run the ingest stage first.");
    const records = parsePages(pages);

    await writeJsonl(cleanFile, records);
    this.log(`Parsed ${records.length} records → ${cleanFile}`);
    return { records: records.length, clean_file: cleanFile };
  }

  async chunk(): Promise<ChunkResult> {
    const { cleanFile, chunksFile } = this.options.paths;
    const records = await readJsonl(cleanFile, verseRecordSchema, "Run the parse stage first.");
    const chunks = chunkRecords(records);

    await writeJsonl(chunksFile, chunks);
    this.log(`Created ${chunks.length} chunks → ${chunksFile}`);
    return { chunks: chunks.length, chunks_file: chunksFile };
  }

  async index(): Promise<IndexResult> {
    const { chunksFile } = this.options.paths;
    const chunks = await readJsonl(chunksFile, chunkSchema, "Run the chunk stage first.");
    if (chunks.length === 0) {
      throw new UpstreamDataError(`${chunksFile} has no chunks. Run the chunk stage first.`);
    }

    const { embedder, vectorStore } = this.options;
    this.log(`Indexing ${chunks.length} chunks with ${embedder.version}`);
    const result = await vectorStore.indexChunks(chunks, embedder, {
      onProgress: ({ indexed, total }) => this.log(`  embedded ${indexed}/${total}`),
    });
    this.log(`Indexed ${result.indexed} chunks (replaced ${result.cleared})`);

    return { ...result, embedding_version: embedder.version };
  }

  async status(): Promise<PipelineStatus> {
    const { rawFile, cleanFile, chunksFile } = this.options.paths;
    const indexedChunks = await this.options.vectorStore.collectionSize();

    return {
      raw_pages: await countRawPages(rawFile),
      clean_records: await countJsonlRows(cleanFile),
      chunks: await countJsonlRows(chunksFile),
      indexed_chunks: indexedChunks,
      embedding_version: await this.options.vectorStore.embeddingVersion(),
      ready: indexedChunks > 0,
    };
  }

  /** Clean records in book order, or only the records of one verse. */
  async browse(verse?: string): Promise<VerseRecord[]> {
    const records = await readJsonl(
      this.options.paths.cleanFile,
      verseRecordSchema,
      "Run the parse stage first.",
    );
    if (verse === undefined) {
      return records;
    }
    const wanted = verse.trim().toLowerCase();
    return records.filter((record) => record.verse_number.toLowerCase() === wanted);
  }
}

async function readPagesFile(filePath: string, hint: string): Promise<SourcePage[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isFileMissing(error)) {
      throw new UpstreamDataError(`Missing ${filePath}. ${hint}`);
    }
    throw error;
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new UpstreamDataError(`${filePath} is not valid JSON. ${hint}`);
  }

  const parsed = sourcePagesSchema.safeParse(value);
  if (!parsed.success) {
    throw new UpstreamDataError(
      `${filePath} is malformed (${describeIssues(parsed.error)}). ${hint}`,
    );
  }
  return parsed.data;
}

async function countRawPages(filePath: string): Promise<number | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  const pages = await readPagesFile(filePath, "Re-run the ingest stage.");
  return pages.length;
}
