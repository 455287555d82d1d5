import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "../services/ragService.js";
import { jsonResult } from "./toolResult.js";

interface FailedIndexing {
  id: string;
  reason: string;
}

export function registerIndexDocumentsTool(server: McpServer, service: RagService) {
  server.registerTool(
    "index_documents",
    {
      title: "Index Documents",
      description:
        "Chunks, embeds and indexes documents. Re-indexing an id replaces its previous chunks.",
      inputSchema: {
        documents: z
          .array(
            z.object({
              id: z.string().min(1).describe("Stable document id"),
              text: z.string().describe("Document text"),
              title: z.string().optional(),
              tags: z.array(z.string()).optional(),
            }),
          )
          .min(1)
          .describe("Documents to index"),
      },
    },
    async ({ documents }) => {
      const failed: FailedIndexing[] = [];
      let indexedCount = 0;
      let chunkCount = 0;

      for (const document of documents) {
        try {
          chunkCount += await service.index([
            {
              id: document.id,
              text: document.text,
              metadata: { source: "manual", title: document.title, tags: document.tags },
            },
          ]);
          indexedCount += 1;
        } catch (error) {
          failed.push({
            id: document.id,
            reason: error instanceof Error ? error.message : "unknown error",
          });
        }
      }

      const stats = await service.describe();
      return jsonResult({
        indexed_count: indexedCount,
        chunk_count: chunkCount,
        embedding_enabled: stats.embedding_model !== null,
        failed,
      });
    },
  );
}
