import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RagService } from "../services/ragService.js";
import { jsonResult } from "./toolResult.js";

export function registerIndexStatsTool(server: McpServer, service: RagService) {
  server.registerTool(
    "index_stats",
    {
      title: "Index Stats",
      description: "Reports the vector backend, entry count and configured models.",
      inputSchema: {},
    },
    async () => jsonResult(await service.describe()),
  );
}
