import { PREFACE_VERSE, RetrievalHit } from "../domain/types.js";
import { capitalize } from "../utils/text.js";

/** Matches `[NOI 3 Purport]`-style labels and `[NOI Preface]`. */
export const CITATION_PATTERN = /\[NOI\s+\w+\s+\w+\]|\[NOI\s+Preface\]/i;

export function findCitations(text: string): string[] {
  return text.match(new RegExp(CITATION_PATTERN.source, "gi")) ?? [];
}

export function citationLabel(hit: Pick<RetrievalHit, "verse_number" | "section">): string {
  if (hit.verse_number === PREFACE_VERSE) {
    return "[NOI Preface]";
  }
  return `[NOI ${capitalize(hit.verse_number)} ${capitalize(hit.section)}]`;
}
