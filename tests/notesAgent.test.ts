import { describe, expect, it } from "vitest";
import { EmptyIndexError, MissingCredentialError } from "../src/domain/errors.js";
import { NotesRequest } from "../src/domain/types.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { SYSTEM_PROMPT } from "../src/pipelines/prompts.js";
import { Retriever } from "../src/pipelines/retrieval.js";
import { NotesAgent } from "../src/services/notesAgent.js";
import { KeywordEmbeddingProvider, makeChunk, ScriptedLlmClient } from "./support/stubs.js";

const REQUEST: NotesRequest = {
  topic: "controlling the tongue",
  audience: "new students",
  duration: 45,
  style: "class",
};

const OUTLINE = "1. The six urges (10 min) [NOI 1 Translation]";

const DRAFT = [
  "# controlling the tongue",
  "## Outline",
  OUTLINE,
  "## Detailed Notes",
  "- The tongue is the first urge to control [NOI 1 Purport]",
  "## Practical Applications",
  "1. Eat only prasādam [NOI 1 Purport]",
  "## Discussion Prompts",
  "1. Why is the tongue hardest to control?",
  "## Appendix: Key Passages",
  '> "Control of the tongue" — [NOI 1 Purport]',
].join("\n");

async function createAgent(llm: ScriptedLlmClient, indexed = true) {
  const embedder = new KeywordEmbeddingProvider(["tongue", "anger"]);
  const store = new InMemoryVectorStore();
  if (indexed) {
    await store.indexChunks(
      [
        makeChunk("NOI-1-purport", "Control of the tongue makes one a gosvāmī."),
        makeChunk("NOI-3-purport", "Anger must be engaged properly.", { verse_number: "3" }),
      ],
      embedder,
    );
  }
  const logs: string[] = [];
  const agent = new NotesAgent(llm, new Retriever(embedder, store, 8), {
    topK: 8,
    maxTokens: 4096,
    excerptMaxChars: 300,
    log: (message) => logs.push(message),
  });
  return { agent, logs };
}

describe("NotesAgent", () => {
  it("runs retrieve, plan, draft and verify in order", async () => {
    const llm = new ScriptedLlmClient([OUTLINE, DRAFT, '{"pass": true, "issues": []}']);
    const { agent, logs } = await createAgent(llm);

    const result = await agent.run(REQUEST);

    expect(result.hits.map((hit) => hit.chunk_id)).toEqual(["NOI-1-purport", "NOI-3-purport"]);
    expect(result.outline).toBe(OUTLINE);
    expect(result.rule.pass).toBe(true);
    expect(result.rule.citation_count).toBe(4);
    expect(result.llm).toEqual({ pass: true, issues: [] });
    expect(result.notes).toBe(
      DRAFT +
        "\n\n---\n\n## Verification (PASSED)\n" +
        "- Citations found: 4\n" +
        "- Sections check: ✓\n" +
        "- Excerpts check: ✓\n",
    );

    expect(llm.requests).toHaveLength(3);
    const [plan, draft, verify] = llm.requests;
    expect(plan.system).toBe(SYSTEM_PROMPT);
    expect(plan.maxTokens).toBe(4096);
    expect(plan.prompt).toContain('create a structured outline for a class on the topic: "controlling the tongue"');
    expect(plan.prompt).toContain("Audience: new students\nDuration: 45 minutes");
    expect(plan.prompt).toContain("[NOI 1 - purport]\nSource: https://example.org/noi/1/");
    expect(draft.prompt).toContain(`Outline:\n${OUTLINE}\n`);
    expect(draft.prompt).toContain("Each quote must be ≤ 300 characters");
    expect(draft.prompt).toContain(
      "## Detailed Notes\n\n[For each section in the outline, write 3-5 key points.\n" +
        " Each key point MUST end with a citation like [NOI 3 Purport].]\n\n" +
        "## Stories & Supplemental References (optional)\n",
    );
    expect(draft.prompt.indexOf("## Stories & Supplemental References")).toBeLessThan(
      draft.prompt.indexOf("## Practical Applications"),
    );
    expect(verify.maxTokens).toBe(512);

    expect(logs[0]).toBe('[1/4] Retrieving passages for "controlling the tongue"');
  });

  it("returns only the notes from generateNotes", async () => {
    const llm = new ScriptedLlmClient([OUTLINE, "## Outline only", "not json"]);
    const { agent } = await createAgent(llm);

    const notes = await agent.generateNotes(REQUEST);

    expect(notes.startsWith("## Outline only\n\n---\n\n## Verification (WARNINGS)\n")).toBe(true);
    expect(notes).toContain("- Could not parse verifier response: not json\n");
  });

  it("requires a configured model before doing anything", async () => {
    const llm = new ScriptedLlmClient([], false);
    const { agent } = await createAgent(llm, false);

    await expect(agent.run(REQUEST)).rejects.toBeInstanceOf(MissingCredentialError);
    expect(llm.requests).toHaveLength(0);
  });

  it("stops when the index is empty", async () => {
    const llm = new ScriptedLlmClient([OUTLINE]);
    const { agent } = await createAgent(llm, false);

    await expect(agent.run(REQUEST)).rejects.toBeInstanceOf(EmptyIndexError);
    expect(llm.requests).toHaveLength(0);
  });

  it("propagates a failed model call without verifying", async () => {
    const llm = new ScriptedLlmClient([OUTLINE, new Error("chat failed (500)")]);
    const { agent } = await createAgent(llm);

    await expect(agent.run(REQUEST)).rejects.toThrow("chat failed (500)");
    expect(llm.requests).toHaveLength(2);
  });
});
