export const BOOK_CODE = "NOI";

export const PREFACE_VERSE = "preface";

export type ChunkSection = "translation" | "purport" | "preface";

export interface SourcePage {
  id: string;
  title: string;
  url: string;
  text: string;
}

export interface VerseRecord {
  id: string;
  book: string;
  verse_number: string;
  verse_sanskrit: string;
  translation: string;
  purport: string;
  section_title: string;
  source_uri: string;
}

export interface Chunk {
  chunk_id: string;
  parent_id: string;
  book: string;
  verse_number: string;
  section: ChunkSection;
  text: string;
  source_uri: string;
}

export interface ChunkMetadata {
  parent_id: string;
  book: string;
  verse_number: string;
  section: ChunkSection;
  source_uri: string;
}

export interface IndexedVector {
  chunk_id: string;
  embedding: number[];
  document_text: string;
  metadata: ChunkMetadata;
}

export interface RetrievalHit {
  text: string;
  chunk_id: string;
  verse_number: string;
  section: ChunkSection;
  source_uri: string;
  distance: number;
}

export type JobStatus = "running" | "done" | "error";

export type NotesStyle = "class" | "discourse";

export interface NotesRequest {
  topic: string;
  audience: string;
  duration: number;
  style: NotesStyle;
}

export interface Job extends NotesRequest {
  job_id: string;
  status: JobStatus;
  created_at: string;
  completed_at: string | null;
  result_path: string | null;
  error: string | null;
}
