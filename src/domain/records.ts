import { z } from "zod";
import { Chunk, Job, VerseRecord } from "./types.js";

export const sourcePageSchema = z.object({
  id: z.coerce.string().min(1),
  title: z.string().default(""),
  url: z.string().default(""),
  text: z.string().default(""),
});

export const sourcePagesSchema = z.array(sourcePageSchema);

export const verseRecordSchema = z.object({
  id: z.string().min(1),
  book: z.string().min(1),
  verse_number: z.string().min(1),
  verse_sanskrit: z.string(),
  translation: z.string(),
  purport: z.string(),
  section_title: z.string(),
  source_uri: z.string(),
}) satisfies z.ZodType<VerseRecord>;

export const chunkSectionSchema = z.enum(["translation", "purport", "preface"]);

export const chunkSchema = z.object({
  chunk_id: z.string().min(1),
  parent_id: z.string().min(1),
  book: z.string().min(1),
  verse_number: z.string().min(1),
  section: chunkSectionSchema,
  text: z.string().min(11),
  source_uri: z.string(),
}) satisfies z.ZodType<Chunk>;

export const notesRequestSchema = z.object({
  topic: z.string().trim().min(2),
  audience: z.string().trim().min(1).default("general devotees"),
  duration: z.number().int().positive().default(60),
  style: z.enum(["class", "discourse"]).default("class"),
});

export const jobSchema = z.object({
  job_id: z.string().min(1),
  topic: z.string(),
  audience: z.string(),
  duration: z.number(),
  style: z.enum(["class", "discourse"]),
  status: z.enum(["running", "done", "error"]),
  created_at: z.string(),
  completed_at: z.string().nullable(),
  result_path: z.string().nullable(),
  error: z.string().nullable(),
}) satisfies z.ZodType<Job>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
