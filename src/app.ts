import { AppConfig } from "./config/env.js";
import { NotesRequest } from "./domain/types.js";
import { VectorStore } from "./domain/vectorStore.js";
import { createAiClients } from "./infra/ai/createAiClients.js";
import { EmbeddingProvider, LlmClient } from "./infra/ai/types.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { exportNotes } from "./pipelines/exporting.js";
import { Retriever } from "./pipelines/retrieval.js";
import { JobManager } from "./services/jobManager.js";
import { NotesAgent } from "./services/notesAgent.js";
import { PipelineService } from "./services/pipelineService.js";

export interface AppContext {
  config: AppConfig;
  llm: LlmClient;
  embedder: EmbeddingProvider;
  vectorStore: VectorStore;
  retriever: Retriever;
  agent: NotesAgent;
  pipeline: PipelineService;
  jobs: JobManager;
  /** Generates notes for a request and saves them under the outputs directory. */
  generateAndExport: (request: NotesRequest, outDir?: string) => Promise<string>;
  close: () => Promise<void>;
}

export async function createAppContext(config: AppConfig): Promise<AppContext> {
  const { llm, embedder } = createAiClients(config);
  const { vectorStore, close } = await createVectorStore(config);

  const retriever = new Retriever(embedder, vectorStore, config.topK);
  const agent = new NotesAgent(llm, retriever, {
    topK: config.topK,
    maxTokens: config.maxTokens,
    excerptMaxChars: config.excerptMaxChars,
  });
  const pipeline = new PipelineService({
    paths: config.paths,
    sourcePath: config.sourcePath,
    vectorStore,
    embedder,
  });

  const generateAndExport = async (request: NotesRequest, outDir?: string) => {
    const notes = await agent.generateNotes(request);
    return exportNotes(notes, request.topic, outDir ?? config.paths.outputsDir);
  };

  const jobs = new JobManager({
    jobsDir: config.paths.jobsDir,
    runJob: (request) => generateAndExport(request),
  });

  return {
    config,
    llm,
    embedder,
    vectorStore,
    retriever,
    agent,
    pipeline,
    jobs,
    generateAndExport,
    close,
  };
}
