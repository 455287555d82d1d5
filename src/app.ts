import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagService } from "./services/ragService.js";
import { registerAskTool } from "./tools/ask.js";
import { registerGetDocumentsTool } from "./tools/getDocuments.js";
import { registerIndexDocumentsTool } from "./tools/indexDocuments.js";
import { registerIndexStatsTool } from "./tools/indexStats.js";
import { registerIngestUrlTool } from "./tools/ingestUrl.js";
import { registerListHistoryTool } from "./tools/listHistory.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "grounded-rag-mcp";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: RagService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
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
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerIndexDocumentsTool(server, service);
  registerSearchChunksTool(server, service);
  registerAskTool(server, service);
  registerIngestUrlTool(server, service);
  registerListHistoryTool(server, service);
  registerIndexStatsTool(server, service);
  registerGetDocumentsTool(server, service);

  return server;
}
