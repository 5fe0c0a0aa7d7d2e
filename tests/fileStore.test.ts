import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { UpstreamDataError } from "../src/domain/errors.js";
import {
  countJsonlRows,
  readJsonl,
  writeFileAtomic,
  writeJsonl,
} from "../src/infra/files/fileStore.js";

describe("fileStore", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "verse-notes-files-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("completes simultaneous writes to the same file", async () => {
    const target = path.join(tempDir, "exports", "notes_tongue_2026-01-01.md");
    const contents = ["one", "two", "three", "four", "five"];

    await Promise.all(contents.map((content) => writeFileAtomic(target, content)));

    expect(contents).toContain(await fs.readFile(target, "utf-8"));
    expect(await fs.readdir(path.dirname(target))).toEqual(["notes_tongue_2026-01-01.md"]);
  });

  it("reads back rows with line-numbered errors", async () => {
    const file = path.join(tempDir, "rows.jsonl");
    const schema = z.object({ id: z.string() });

    await writeJsonl(file, [{ id: "NOI-1" }, { id: "NOI-2" }]);
    await expect(readJsonl(file, schema, "Run parse.")).resolves.toEqual([
      { id: "NOI-1" },
      { id: "NOI-2" },
    ]);
    await expect(countJsonlRows(file)).resolves.toBe(2);

    await fs.writeFile(file, '{"id":"NOI-1"}\nnot json\n', "utf-8");
    await expect(readJsonl(file, schema, "Run parse.")).rejects.toThrow(
      `${file}:2 is not valid JSON. Run parse.`,
    );
  });

  it("names the stage to run when the file is missing", async () => {
    const file = path.join(tempDir, "missing.jsonl");

    await expect(countJsonlRows(file)).resolves.toBeNull();
    await expect(
      readJsonl(file, z.object({ id: z.string() }), "Run parse."),
    ).rejects.toBeInstanceOf(UpstreamDataError);
  });
});
