import { z } from "zod";
import { LlmClient } from "../infra/ai/types.js";
import { findCitations } from "./citations.js";
import { buildVerifyPrompt, SYSTEM_PROMPT } from "./prompts.js";

export const REQUIRED_SECTIONS = [
  "## Outline",
  "## Detailed Notes",
  "## Practical Applications",
  "## Discussion Prompts",
  "## Appendix",
] as const;

export const MIN_CITATIONS = 3;

const VERIFY_NOTES_MAX_CHARS = 8000;
const VERIFY_MAX_TOKENS = 512;
const EXCERPT_PATTERN = />\s*"([^"]+)"/g;

export interface RuleCheckResult {
  sections_ok: boolean;
  citations_ok: boolean;
  excerpts_ok: boolean;
  citation_count: number;
  missing_sections: string[];
  issues: string[];
  pass: boolean;
}

const llmVerdictSchema = z.object({
  all_points_cited: z.boolean().optional(),
  required_sections_present: z.boolean().optional(),
  excerpts_within_limit: z.boolean().optional(),
  issues: z.array(z.string()).default([]),
  pass: z.boolean().default(true),
});

export type LlmCheckResult = z.infer<typeof llmVerdictSchema>;

export interface LlmCheckOptions {
  excerptMaxChars: number;
}

/** Structural checks only; never calls a model. */
export function ruleCheck(notes: string, excerptMaxChars: number): RuleCheckResult {
  const issues: string[] = [];

  const missingSections = REQUIRED_SECTIONS.filter((section) => !notes.includes(section));
  if (missingSections.length > 0) {
    issues.push(`Missing sections: ${missingSections.join(", ")}`);
  }

  const citationCount = findCitations(notes).length;
  if (citationCount < MIN_CITATIONS) {
    issues.push(
      `Too few citations (${citationCount} found — expected at least ${MIN_CITATIONS}). ` +
        "Every key point should have a citation.",
    );
  }

  const longExcerpts = [...notes.matchAll(EXCERPT_PATTERN)]
    .map((match) => match[1])
    .filter((excerpt) => excerpt.length > excerptMaxChars);
  if (longExcerpts.length > 0) {
    issues.push(`${longExcerpts.length} excerpt(s) exceed ${excerptMaxChars} chars.`);
  }

  return {
    sections_ok: missingSections.length === 0,
    citations_ok: citationCount >= MIN_CITATIONS,
    excerpts_ok: longExcerpts.length === 0,
    citation_count: citationCount,
    missing_sections: [...missingSections],
    issues,
    pass: issues.length === 0,
  };
}

/**
 * Asks the model to review the notes. Skipped (and passing) when the client
 * has no credential; a reply that is not the expected JSON fails the check.
 */
export async function llmCheck(
  notes: string,
  llm: LlmClient,
  options: LlmCheckOptions,
): Promise<LlmCheckResult> {
  if (!llm.isConfigured()) {
    return { pass: true, issues: ["LLM check skipped — no API key"] };
  }

  const reply = await llm.complete({
    system: SYSTEM_PROMPT,
    prompt: buildVerifyPrompt(notes.slice(0, VERIFY_NOTES_MAX_CHARS), options.excerptMaxChars),
    maxTokens: VERIFY_MAX_TOKENS,
  });

  const raw = stripJsonFence(reply.trim());
  const failure: LlmCheckResult = {
    pass: false,
    issues: [`Could not parse verifier response: ${raw.slice(0, 200)}`],
  };

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return failure;
  }

  const parsed = llmVerdictSchema.safeParse(value);
  return parsed.success ? parsed.data : failure;
}

export function buildVerificationFooter(rule: RuleCheckResult, llm: LlmCheckResult): string {
  const status = rule.pass && llm.pass ? "PASSED" : "WARNINGS";
  const issues = [...rule.issues, ...llm.issues];
  const mark = (ok: boolean) => (ok ? "✓" : "✗");

  let footer = `\n\n---\n\n## Verification (${status})\n`;
  footer += `- Citations found: ${rule.citation_count}\n`;
  footer += `- Sections check: ${mark(rule.sections_ok)}\n`;
  footer += `- Excerpts check: ${mark(rule.excerpts_ok)}\n`;

  if (issues.length > 0) {
    footer += "\n**Issues found:**\n";
    for (const issue of issues) {
      footer += `- ${issue}\n`;
    }
  }

  return footer;
}

function stripJsonFence(text: string): string {
  return text.replace(/^```json\s*/, "").replace(/\s*```$/, "");
}
