import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { errorMessage, JobStillRunningError, UpstreamDataError } from "../domain/errors.js";
import { describeIssues, jobSchema } from "../domain/records.js";
import { Job, NotesRequest } from "../domain/types.js";
import { fileExists, isFileMissing, writeFileAtomic } from "../infra/files/fileStore.js";

const JOB_ID_PATTERN = /^[A-Za-z0-9-]+$/;

/** Produces the notes for a request and returns the path they were saved to. */
export type NotesJobRunner = (request: NotesRequest) => Promise<string>;

export interface JobManagerOptions {
  jobsDir: string;
  runJob: NotesJobRunner;
  log?: (message: string) => void;
  now?: () => Date;
}

/**
 * Notes generation as local background jobs. Each job is one JSON file under
 * the jobs directory, so any process sharing the directory can poll it.
 */
export class JobManager {
  private readonly jobsDir: string;

  private readonly pending = new Map<string, Promise<void>>();

  private readonly log: (message: string) => void;

  private readonly now: () => Date;

  constructor(private readonly options: JobManagerOptions) {
    this.jobsDir = path.resolve(options.jobsDir);
    this.log = options.log ?? ((message) => console.error(message));
    this.now = options.now ?? (() => new Date());
  }

  /** Persists the `running` record, then returns while the work continues. */
  async start(request: NotesRequest): Promise<string> {
    const jobId = await this.allocateJobId();
    const job: Job = {
      job_id: jobId,
      topic: request.topic,
      audience: request.audience,
      duration: request.duration,
      style: request.style,
      status: "running",
      created_at: this.now().toISOString(),
      completed_at: null,
      result_path: null,
      error: null,
    };
    await this.write(job);

    const work = this.execute(job, request).finally(() => {
      this.pending.delete(jobId);
    });
    this.pending.set(jobId, work);
    return jobId;
  }

  async get(jobId: string): Promise<Job | null> {
    if (!JOB_ID_PATTERN.test(jobId)) {
      return null;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.jobPath(jobId), "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
    return parseJob(raw, this.jobPath(jobId));
  }

  /** Newest first. Files that cannot be read are skipped. */
  async list(): Promise<Job[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.jobsDir);
    } catch (error) {
      if (isFileMissing(error)) {
        return [];
      }
      throw error;
    }

    const jobs: Job[] = [];
    for (const name of names.filter((entry) => entry.endsWith(".json"))) {
      const filePath = path.join(this.jobsDir, name);
      try {
        jobs.push(parseJob(await fs.readFile(filePath, "utf-8"), filePath));
      } catch (error) {
        this.log(`Skipping job file ${filePath}: ${errorMessage(error)}`);
      }
    }

    return jobs.sort(
      (a, b) => b.created_at.localeCompare(a.created_at) || a.job_id.localeCompare(b.job_id),
    );
  }

  async hasRunning(): Promise<boolean> {
    const jobs = await this.list();
    return jobs.some((job) => job.status === "running");
  }

  /** Deletes a finished job's record. Returns false when there was none. */
  async remove(jobId: string): Promise<boolean> {
    const job = await this.get(jobId);
    if (!job) {
      return false;
    }
    if (job.status === "running") {
      throw new JobStillRunningError(jobId);
    }
    await fs.rm(this.jobPath(jobId), { force: true });
    return true;
  }

  /**
   * Resolves once a job started by this manager has written its terminal
   * state. Jobs from other processes are returned as currently stored.
   */
  async settled(jobId: string): Promise<Job | null> {
    await this.pending.get(jobId);
    return this.get(jobId);
  }

  private async execute(job: Job, request: NotesRequest): Promise<void> {
    let finished: Job;
    try {
      const resultPath = await this.options.runJob(request);
      finished = {
        ...job,
        status: "done",
        completed_at: this.now().toISOString(),
        result_path: resultPath,
      };
      this.log(`Job ${job.job_id} done: ${resultPath}`);
    } catch (error) {
      finished = {
        ...job,
        status: "error",
        completed_at: this.now().toISOString(),
        error: errorMessage(error),
      };
      this.log(`Job ${job.job_id} failed: ${errorMessage(error)}`);
    }

    try {
      await this.write(finished);
    } catch (error) {
      this.log(`Could not record final state of job ${job.job_id}: ${errorMessage(error)}`);
    }
  }

  private async allocateJobId(): Promise<string> {
    for (;;) {
      const jobId = randomUUID().slice(0, 8);
      if (!(await fileExists(this.jobPath(jobId)))) {
        return jobId;
      }
    }
  }

  private write(job: Job): Promise<void> {
    return writeFileAtomic(this.jobPath(job.job_id), `${JSON.stringify(job, null, 2)}\n`);
  }

  private jobPath(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }
}

function parseJob(raw: string, filePath: string): Job {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new UpstreamDataError(`${filePath} is not valid JSON.`);
  }
  const parsed = jobSchema.safeParse(value);
  if (!parsed.success) {
    throw new UpstreamDataError(`${filePath} is malformed (${describeIssues(parsed.error)}).`);
  }
  return parsed.data;
}
