import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { JobManager } from "../services/jobManager.js";
import { PipelineService } from "../services/pipelineService.js";

export function registerPipelineStatusTool(
  server: McpServer,
  pipeline: PipelineService,
  jobs: JobManager,
) {
  server.registerTool(
    "pipeline_status",
    {
      title: "Pipeline Status",
      description: "Reports which pipeline stages have run and whether notes can be generated.",
      inputSchema: {},
    },
    async () => {
      const status = await pipeline.status();

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              { ...status, has_running_jobs: await jobs.hasRunning() },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
