import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { describeIssues } from "../../domain/records.js";
import { UpstreamDataError } from "../../domain/errors.js";

export function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isFileMissing(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Writes `content` beside the target and renames it into place so readers
 * never observe a half-written file.
 */
export async function writeFileAtomic(targetPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  const tempPath = `${targetPath}.${process.pid}.${randomUUID()}.tmp`;
  await fs.writeFile(tempPath, content, "utf-8");
  await replaceFileSafely(tempPath, targetPath, content);
}

export async function writeJsonl<T>(targetPath: string, rows: T[]): Promise<void> {
  const body = rows.map((row) => JSON.stringify(row)).join("\n");
  await writeFileAtomic(targetPath, rows.length > 0 ? `${body}\n` : "");
}

export async function readJsonl<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  missingHint: string,
): Promise<T[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isFileMissing(error)) {
      throw new UpstreamDataError(`Missing ${filePath}. ${missingHint}`);
    }
    throw error;
  }

  const rows: T[] = [];
  const lines = raw.split("\n");
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i].trim();
    if (!line) {
      continue;
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      throw new UpstreamDataError(
        `${filePath}:${i + 1} is not valid JSON. ${missingHint}`,
      );
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new UpstreamDataError(
        `${filePath}:${i + 1} is malformed (${describeIssues(parsed.error)}). ${missingHint}`,
      );
    }
    rows.push(parsed.data);
  }

  return rows;
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

/** Non-blank line count, or null when the file does not exist. */
export async function countJsonlRows(filePath: string): Promise<number | null> {
  try {
    const raw = await fs.readFile(filePath, "utf-8");
    return raw.split("\n").filter((line) => line.trim()).length;
  } catch (error) {
    if (isFileMissing(error)) {
      return null;
    }
    throw error;
  }
}
