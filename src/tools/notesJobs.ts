import { promises as fs } from "node:fs";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { notesRequestSchema } from "../domain/records.js";
import { JobManager } from "../services/jobManager.js";

const jobIdInput = z.string().min(1).describe("Id returned by start_notes_job");

export function registerNotesJobTools(server: McpServer, jobs: JobManager) {
  server.registerTool(
    "start_notes_job",
    {
      title: "Start Notes Job",
      description:
        "Starts generating cited study notes in the background. Poll get_notes_job for the result.",
      inputSchema: notesRequestSchema.shape,
    },
    async (request) => {
      const jobId = await jobs.start(request);
      return jsonContent({ job_id: jobId, status: "running" });
    },
  );

  server.registerTool(
    "get_notes_job",
    {
      title: "Get Notes Job",
      description: "Returns a job's state, and the generated notes once it is done.",
      inputSchema: { job_id: jobIdInput },
    },
    async ({ job_id }) => {
      const job = await jobs.get(job_id);
      if (!job) {
        throw new Error(`Unknown job: ${job_id}`);
      }
      const notes =
        job.status === "done" && job.result_path
          ? await fs.readFile(job.result_path, "utf-8")
          : null;
      return jsonContent({ ...job, notes });
    },
  );

  server.registerTool(
    "list_notes_jobs",
    {
      title: "List Notes Jobs",
      description: "Lists notes jobs, newest first.",
      inputSchema: {},
    },
    async () => {
      const list = await jobs.list();
      return jsonContent({
        jobs: list,
        has_running: list.some((job) => job.status === "running"),
      });
    },
  );

  server.registerTool(
    "remove_notes_job",
    {
      title: "Remove Notes Job",
      description: "Deletes the record of a finished job. Running jobs are refused.",
      inputSchema: { job_id: jobIdInput },
    },
    async ({ job_id }) => {
      const removed = await jobs.remove(job_id);
      return jsonContent({ job_id, removed });
    },
  );
}

function jsonContent(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}
