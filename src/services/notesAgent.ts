import { EmptyIndexError, MissingCredentialError } from "../domain/errors.js";
import { NotesRequest, RetrievalHit } from "../domain/types.js";
import { LlmClient } from "../infra/ai/types.js";
import { buildDraftPrompt, buildPlanPrompt, SYSTEM_PROMPT } from "../pipelines/prompts.js";
import { formatContext, Retriever } from "../pipelines/retrieval.js";
import {
  buildVerificationFooter,
  llmCheck,
  LlmCheckResult,
  ruleCheck,
  RuleCheckResult,
} from "../pipelines/verification.js";

export interface NotesAgentOptions {
  topK: number;
  maxTokens: number;
  excerptMaxChars: number;
  log?: (message: string) => void;
}

export interface NotesRun {
  /** Draft with the verification footer appended. */
  notes: string;
  outline: string;
  hits: RetrievalHit[];
  rule: RuleCheckResult;
  llm: LlmCheckResult;
}

/**
 * Retrieve, plan, draft, verify. Each phase runs once, in order; a failing
 * phase aborts the run and the error reaches the caller unchanged.
 */
export class NotesAgent {
  private readonly log: (message: string) => void;

  constructor(
    private readonly llm: LlmClient,
    private readonly retriever: Retriever,
    private readonly options: NotesAgentOptions,
  ) {
    this.log = options.log ?? ((message) => console.error(message));
  }

  async generateNotes(request: NotesRequest): Promise<string> {
    const { notes } = await this.run(request);
    return notes;
  }

  async run(request: NotesRequest): Promise<NotesRun> {
    if (!this.llm.isConfigured()) {
      throw new MissingCredentialError(
        "No LLM credential configured. Set OPENAI_API_KEY in .env or use LLM_PROVIDER=ollama.",
      );
    }

    this.log(`[1/4] Retrieving passages for "${request.topic}"`);
    const hits = await this.retriever.retrieve(request.topic, this.options.topK);
    if (hits.length === 0) {
      throw new EmptyIndexError();
    }
    const context = formatContext(hits);
    this.log(`  found ${hits.length} passages`);

    this.log("[2/4] Planning outline");
    const outline = await this.complete(buildPlanPrompt(request, context));

    this.log("[3/4] Drafting notes");
    const draft = await this.complete(
      buildDraftPrompt(request, outline, context, this.options.excerptMaxChars),
    );

    this.log("[4/4] Verifying notes");
    const rule = ruleCheck(draft, this.options.excerptMaxChars);
    if (rule.issues.length > 0) {
      this.log(`  rule check issues: ${rule.issues.join(" | ")}`);
    } else {
      this.log(`  rule check passed (${rule.citation_count} citations)`);
    }

    const llm = await llmCheck(draft, this.llm, {
      excerptMaxChars: this.options.excerptMaxChars,
    });
    if (!llm.pass) {
      this.log(`  LLM check issues: ${llm.issues.join(" | ")}`);
    }

    return {
      notes: draft + buildVerificationFooter(rule, llm),
      outline,
      hits,
      rule,
      llm,
    };
  }

  private complete(prompt: string): Promise<string> {
    return this.llm.complete({
      system: SYSTEM_PROMPT,
      prompt,
      maxTokens: this.options.maxTokens,
    });
  }
}
