import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  DEFAULT_HISTORY_LIMIT,
  MAX_HISTORY_LIMIT,
  RagService,
} from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerListHistoryTool(server: McpServer, service: RagService) {
  server.registerTool(
    "list_history",
    {
      title: "List History",
      description: "Lists recent questions and answers, newest first.",
      inputSchema: {
        limit: z.number().int().min(1).max(MAX_HISTORY_LIMIT).optional(),
      },
    },
    async ({ limit }) => {
      const items = await service.listHistory(limit ?? DEFAULT_HISTORY_LIMIT);
      if (items === null) {
        return errorResult("Interaction history is disabled (HISTORY_ENABLED=false).");
      }
      return jsonResult({ count: items.length, items });
    },
  );
}
