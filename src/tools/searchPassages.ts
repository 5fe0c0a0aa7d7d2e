import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { chunkSectionSchema } from "../domain/records.js";
import { citationLabel } from "../pipelines/citations.js";
import { relevancePercent, Retriever } from "../pipelines/retrieval.js";

export function registerSearchPassagesTool(server: McpServer, retriever: Retriever) {
  server.registerTool(
    "search_passages",
    {
      title: "Search Passages",
      description: "Retrieves the indexed passages closest to a topic, with citation labels.",
      inputSchema: {
        query: z.string().min(2).describe("Topic or question"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
        verse_number: z.string().optional().describe("Only this verse, e.g. \"3\" or \"preface\""),
        section: chunkSectionSchema.optional().describe("Only this section"),
      },
    },
    async ({ query, top_k, verse_number, section }) => {
      const hits = await retriever.retrieve(query, top_k, { verse_number, section });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                query,
                hits: hits.map((hit) => ({
                  citation: citationLabel(hit),
                  relevance_percent: relevancePercent(hit),
                  chunk_id: hit.chunk_id,
                  source_uri: hit.source_uri,
                  snippet: hit.text.slice(0, 240),
                })),
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
