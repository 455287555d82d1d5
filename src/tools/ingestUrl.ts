import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ExtractionError } from "../domain/errors.js";
import { RagService } from "../services/ragService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerIngestUrlTool(server: McpServer, service: RagService) {
  server.registerTool(
    "ingest_url",
    {
      title: "Ingest URL",
      description: "Fetches a web page, extracts its readable text and indexes it.",
      inputSchema: {
        url: z.string().url().describe("http(s) URL of the page"),
      },
    },
    async ({ url }) => {
      try {
        return jsonResult(await service.ingestUrl(url));
      } catch (error) {
        if (error instanceof ExtractionError) {
          return errorResult(error.message);
        }
        throw error;
      }
    },
  );
}
