import { promises as fs } from "node:fs";
import path from "node:path";
import { isFileMissing, writeFileAtomic } from "../infra/files/fileStore.js";

const SLUG_MAX_CHARS = 50;
const EXPORTED_NOTES_PATTERN = /^notes_.*\.md$/;

export interface ExportedNotes {
  name: string;
  path: string;
  size_bytes: number;
  modified_at: string;
}

/** "Controlling the Senses!" becomes "controlling_the_senses". */
export function slugifyTopic(topic: string): string {
  return topic
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .replace(/[\s-]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, SLUG_MAX_CHARS);
}

export async function exportNotes(
  notes: string,
  topic: string,
  outDir: string,
  now: Date = new Date(),
): Promise<string> {
  const fileName = `notes_${slugifyTopic(topic)}_${formatLocalDate(now)}.md`;
  const outPath = path.join(path.resolve(outDir), fileName);
  await writeFileAtomic(outPath, notes);
  return outPath;
}

export async function listExportedNotes(outDir: string): Promise<ExportedNotes[]> {
  let names: string[];
  try {
    names = await fs.readdir(outDir);
  } catch (error) {
    if (isFileMissing(error)) {
      return [];
    }
    throw error;
  }

  const exported: ExportedNotes[] = [];
  for (const name of names.filter((entry) => EXPORTED_NOTES_PATTERN.test(entry))) {
    const filePath = path.join(path.resolve(outDir), name);
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      continue;
    }
    exported.push({
      name,
      path: filePath,
      size_bytes: stat.size,
      modified_at: stat.mtime.toISOString(),
    });
  }

  return exported.sort(
    (a, b) => b.modified_at.localeCompare(a.modified_at) || a.name.localeCompare(b.name),
  );
}

function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}
