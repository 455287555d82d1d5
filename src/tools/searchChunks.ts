import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DEFAULT_SEARCH_K, MAX_TOP_K, RagService } from "../services/ragService.js";
import { jsonResult } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, service: RagService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves the chunks most similar to the query, by cosine similarity.",
      inputSchema: {
        query: z.string().describe("Search query"),
        k: z.number().int().min(1).max(MAX_TOP_K).optional().describe("Max hits"),
      },
    },
    async ({ query, k }) => {
      const hits = await service.search(query, k ?? DEFAULT_SEARCH_K);

      return jsonResult({
        query,
        hits: hits.map((hit) => ({
          id: hit.id,
          document_id: hit.documentId,
          score: hit.score,
          text: hit.text,
        })),
      });
    },
  );
}
