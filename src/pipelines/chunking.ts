import { UpstreamDataError } from "../domain/errors.js";
import { Chunk, ChunkSection, PREFACE_VERSE, VerseRecord } from "../domain/types.js";

export const PURPORT_SPLIT_CHARS = 1200;
export const PURPORT_OVERLAP_CHARS = 200;
export const PREFACE_MIN_PARAGRAPH_CHARS = 50;
export const MIN_CHUNK_CHARS = 11;

/**
 * Splits one verse record into retrievable chunks.
 *
 * A verse yields a translation chunk (transliteration plus translation) and
 * one or two purport chunks; long purports are cut at the midpoint with
 * overlap on both sides. The preface is split into paragraphs instead.
 */
export function chunkRecord(record: VerseRecord): Chunk[] {
  const makeChunk = (section: ChunkSection, text: string, part = 0): Chunk => ({
    chunk_id: `${record.id}-${section}${part > 0 ? `-${part}` : ""}`,
    parent_id: record.id,
    book: record.book,
    verse_number: record.verse_number,
    section,
    text: text.trim(),
    source_uri: record.source_uri,
  });

  const chunks: Chunk[] = [];

  if (record.verse_number === PREFACE_VERSE) {
    const paragraphs = record.purport
      .split("\n\n")
      .map((paragraph) => paragraph.trim())
      .filter(Boolean);

    paragraphs.forEach((paragraph, index) => {
      // Numbering counts the short paragraphs that are skipped.
      if (paragraph.length > PREFACE_MIN_PARAGRAPH_CHARS) {
        chunks.push(makeChunk("preface", paragraph, index + 1));
      }
    });
    return dropShortChunks(chunks);
  }

  let translationText = "";
  if (record.verse_sanskrit) {
    translationText += `Transliteration: ${record.verse_sanskrit}\n\n`;
  }
  if (record.translation) {
    translationText += `Translation: ${record.translation}`;
  }
  if (translationText.trim()) {
    chunks.push(makeChunk("translation", translationText));
  }

  const purport = record.purport.trim();
  if (purport) {
    if (purport.length <= PURPORT_SPLIT_CHARS) {
      chunks.push(makeChunk("purport", purport));
    } else {
      const mid = Math.floor(purport.length / 2);
      chunks.push(makeChunk("purport", purport.slice(0, mid + PURPORT_OVERLAP_CHARS), 1));
      chunks.push(makeChunk("purport", purport.slice(mid - PURPORT_OVERLAP_CHARS), 2));
    }
  }

  return dropShortChunks(chunks);
}

export function chunkRecords(records: VerseRecord[]): Chunk[] {
  const chunks = records.flatMap((record) => chunkRecord(record));

  const seen = new Set<string>();
  for (const chunk of chunks) {
    if (seen.has(chunk.chunk_id)) {
      throw new UpstreamDataError(
        `Duplicate chunk_id "${chunk.chunk_id}". Check the clean records for repeated verses and re-run the parse stage.`,
      );
    }
    seen.add(chunk.chunk_id);
  }

  return chunks;
}

function dropShortChunks(chunks: Chunk[]): Chunk[] {
  return chunks.filter((chunk) => chunk.text.length >= MIN_CHUNK_CHARS);
}
