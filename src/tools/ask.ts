import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DEFAULT_ASK_K, MAX_TOP_K, RagService } from "../services/ragService.js";
import { jsonResult } from "./toolResult.js";

export function registerAskTool(server: McpServer, service: RagService) {
  server.registerTool(
    "ask",
    {
      title: "Ask",
      description:
        "Answers a question from the indexed documents only, citing the retrieved snippets.",
      inputSchema: {
        question: z.string().min(1).describe("Question to answer"),
        k: z.number().int().min(1).max(MAX_TOP_K).optional().describe("Snippets to retrieve"),
      },
    },
    async ({ question, k }) => jsonResult(await service.ask(question, k ?? DEFAULT_ASK_K)),
  );
}
