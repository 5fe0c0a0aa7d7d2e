import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JobStillRunningError } from "../src/domain/errors.js";
import { NotesRequest } from "../src/domain/types.js";
import { JobManager, NotesJobRunner } from "../src/services/jobManager.js";

const REQUEST: NotesRequest = {
  topic: "humility",
  audience: "general devotees",
  duration: 60,
  style: "discourse",
};

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function steppingClock(startIso: string) {
  let current = new Date(startIso).getTime();
  return () => {
    const now = new Date(current);
    current += 60_000;
    return now;
  };
}

describe("JobManager", () => {
  let jobsDir: string;
  let logs: string[];

  beforeEach(async () => {
    jobsDir = await fs.mkdtemp(path.join(os.tmpdir(), "verse-notes-jobs-"));
    logs = [];
  });

  afterEach(async () => {
    await fs.rm(jobsDir, { recursive: true, force: true });
  });

  function createManager(runJob: NotesJobRunner) {
    return new JobManager({
      jobsDir,
      runJob,
      log: (message) => logs.push(message),
      now: steppingClock("2026-03-01T10:00:00.000Z"),
    });
  }

  it("records a running job, then its result", async () => {
    const work = deferred<string>();
    const manager = createManager(() => work.promise);

    const jobId = await manager.start(REQUEST);
    expect(jobId).toMatch(/^[0-9a-f]{8}$/);

    expect(await manager.get(jobId)).toEqual({
      job_id: jobId,
      ...REQUEST,
      status: "running",
      created_at: "2026-03-01T10:00:00.000Z",
      completed_at: null,
      result_path: null,
      error: null,
    });
    expect(await manager.hasRunning()).toBe(true);

    work.resolve("/notes/notes_humility_2026-03-01.md");
    const finished = await manager.settled(jobId);

    expect(finished).toMatchObject({
      status: "done",
      completed_at: "2026-03-01T10:01:00.000Z",
      result_path: "/notes/notes_humility_2026-03-01.md",
      error: null,
    });
    expect(await manager.hasRunning()).toBe(false);
  });

  it("records the failure message", async () => {
    const manager = createManager(async () => {
      throw new Error("No LLM credential configured.");
    });

    const jobId = await manager.start(REQUEST);
    const finished = await manager.settled(jobId);

    expect(finished).toMatchObject({
      status: "error",
      completed_at: "2026-03-01T10:01:00.000Z",
      result_path: null,
      error: "No LLM credential configured.",
    });
    expect(logs).toContain(`Job ${jobId} failed: No LLM credential configured.`);
  });

  it("lists jobs newest first and skips unreadable files", async () => {
    const manager = createManager(async () => "/notes/out.md");

    const first = await manager.start(REQUEST);
    await manager.settled(first);
    const second = await manager.start({ ...REQUEST, topic: "association" });
    await manager.settled(second);
    await fs.writeFile(path.join(jobsDir, "broken.json"), "{", "utf-8");

    const jobs = await manager.list();

    expect(jobs.map((job) => [job.job_id, job.topic])).toEqual([
      [second, "association"],
      [first, "humility"],
    ]);
    expect(logs.filter((line) => line.startsWith("Skipping job file"))).toHaveLength(1);
  });

  it("removes finished jobs and refuses running ones", async () => {
    const work = deferred<string>();
    const manager = createManager(() => work.promise);
    const jobId = await manager.start(REQUEST);

    await expect(manager.remove(jobId)).rejects.toBeInstanceOf(JobStillRunningError);

    work.reject(new Error("cancelled by test"));
    await manager.settled(jobId);

    await expect(manager.remove(jobId)).resolves.toBe(true);
    await expect(manager.get(jobId)).resolves.toBeNull();
    await expect(manager.remove(jobId)).resolves.toBe(false);
  });

  it("treats ids that are not file names as unknown", async () => {
    const manager = createManager(async () => "/notes/out.md");
    await expect(manager.get("../secrets")).resolves.toBeNull();
    await expect(manager.list()).resolves.toEqual([]);
  });

  it("shares job state with another manager on the same directory", async () => {
    const manager = createManager(async () => "/notes/out.md");
    const jobId = await manager.start(REQUEST);
    await manager.settled(jobId);

    const observer = createManager(async () => "/unused.md");
    await expect(observer.settled(jobId)).resolves.toMatchObject({ status: "done" });
  });
});
