import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { z } from "zod";
import { AppContext, createAppContext } from "./app.js";
import { loadConfig } from "./config/env.js";
import { registerNotesJobTools } from "./tools/notesJobs.js";
import { registerPipelineStatusTool } from "./tools/pipelineStatus.js";
import { registerSearchPassagesTool } from "./tools/searchPassages.js";

async function main() {
  const app = await createAppContext(loadConfig());
  const server = createAppServer(app);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`verse-notes MCP server ready (embedding ${app.embedder.version})`);

  const shutdown = () => {
    server
      .close()
      .then(() => app.close())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Failed to shut down cleanly:", error);
          process.exit(1);
        },
      );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function createAppServer(app: AppContext): McpServer {
  const server = new McpServer({
    name: "verse-notes-agent",
    version: "0.1.0",
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `verse-notes-agent is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerPipelineStatusTool(server, app.pipeline, app.jobs);
  registerSearchPassagesTool(server, app.retriever);
  registerNotesJobTools(server, app.jobs);

  return server;
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
