import { UpstreamDataError } from "../domain/errors.js";
import { BOOK_CODE, PREFACE_VERSE, SourcePage, VerseRecord } from "../domain/types.js";

export const PREFACE_MAX_CHARS = 3000;

const TRANSLATION_MARKER = "TRANSLATION";
const PURPORT_MARKER = "PURPORT";
const DIACRITIC_PATTERN = /[āīūṛṝḷṭḍṇśṣñṁḥĀĪŪ]/;

/**
 * Turns one scraped page into a verse record, or `null` when the page has no
 * text. Section markers are assumed to appear once, TRANSLATION before
 * PURPORT; when repeated, the first shortest match wins.
 */
export function parsePage(page: SourcePage): VerseRecord | null {
  const rawText = page.text ?? "";
  if (!rawText.trim()) {
    return null;
  }

  const verseNumber = page.id === PREFACE_VERSE ? PREFACE_VERSE : page.id;
  const isPreface = verseNumber === PREFACE_VERSE;

  return {
    id: verseRecordId(BOOK_CODE, verseNumber),
    book: BOOK_CODE,
    verse_number: verseNumber,
    verse_sanskrit: isPreface ? "" : extractTransliteration(rawText),
    translation: isPreface
      ? ""
      : extractSection(rawText, TRANSLATION_MARKER, PURPORT_MARKER),
    purport: isPreface
      ? rawText.trim().slice(0, PREFACE_MAX_CHARS).trim()
      : extractSection(rawText, PURPORT_MARKER, null),
    section_title: page.title,
    source_uri: page.url,
  };
}

export function parsePages(pages: SourcePage[]): VerseRecord[] {
  const records: VerseRecord[] = [];
  const seen = new Set<string>();

  for (const page of pages) {
    const record = parsePage(page);
    if (!record) {
      continue;
    }
    if (seen.has(record.id)) {
      throw new UpstreamDataError(
        `Duplicate verse "${record.verse_number}" in raw pages. Re-run the ingest stage.`,
      );
    }
    seen.add(record.id);
    records.push(record);
  }

  return records;
}

export function verseRecordId(book: string, verseNumber: string): string {
  return `${book}-${verseNumber}`;
}

export function extractSection(
  text: string,
  startMarker: string,
  endMarker: string | null,
): string {
  const pattern = endMarker
    ? new RegExp(`${escapeRegExp(startMarker)}\\s*(.*?)\\s*${escapeRegExp(endMarker)}`, "is")
    : new RegExp(`${escapeRegExp(startMarker)}\\s*(.*)`, "is");

  const match = pattern.exec(text);
  return match?.[1]?.trim() ?? "";
}

/**
 * First line that looks like romanized Sanskrit (has a diacritic, 21–499
 * characters, no section marker). Any line with such a character qualifies,
 * so accented words elsewhere can be picked up instead.
 */
export function extractTransliteration(text: string): string {
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    const upper = line.toUpperCase();
    if (
      DIACRITIC_PATTERN.test(line) &&
      line.length > 20 &&
      line.length < 500 &&
      !upper.includes(TRANSLATION_MARKER) &&
      !upper.includes(PURPORT_MARKER)
    ) {
      return line;
    }
  }
  return "";
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
