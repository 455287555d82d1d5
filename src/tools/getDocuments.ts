import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

const MAX_DOCUMENT_IDS = 20;

export function registerGetDocumentsTool(server: McpServer, service: RagService) {
  server.registerTool(
    "get_documents",
    {
      title: "Get Documents",
      description: "Returns the full stored text of indexed documents, e.g. the document_id of a search hit.",
      inputSchema: {
        ids: z.array(z.string().min(1)).min(1).max(MAX_DOCUMENT_IDS),
      },
    },
    async ({ ids }) => {
      const documents = await service.getDocuments(ids);
      if (documents === null) {
        return errorResult("No document store is configured.");
      }
      const found = new Set(documents.map((document) => document.id));
      return jsonResult({
        documents,
        missing: ids.filter((id) => !found.has(id)),
      });
    },
  );
}
