#!/usr/bin/env node
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import "dotenv/config";
import { createAppServer } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createAiClients, verifyEmbeddingDimension } from "./infra/ai/createAiClients.js";
import { WebPageLoader } from "./infra/parsers/webPageLoader.js";
import { createVectorIndex } from "./infra/store/createVectorIndex.js";
import { InMemoryDocumentStore } from "./infra/store/inMemoryDocumentStore.js";
import { InMemoryInteractionHistory } from "./infra/store/inMemoryInteractionHistory.js";
import { RagService } from "./services/ragService.js";
import { createLogger, Logger } from "./utils/logger.js";

const MCP_PATH = "/mcp";

async function main() {
  const config = loadConfig();
  const logger = createLogger("server", config.logLevel);
  const { embedder, llm } = createAiClients(config, logger);

  if (embedder) {
    await verifyEmbeddingDimension(embedder, config.vectorDimension, logger);
  }

  const { vectorIndex, close } = await createVectorIndex(config);
  const service = new RagService({
    vectorIndex,
    embedder,
    llm,
    documentStore: new InMemoryDocumentStore(),
    history: config.historyEnabled ? new InMemoryInteractionHistory() : null,
    pageLoader: new WebPageLoader({
      timeoutMs: config.webFetchTimeoutMs,
      minTextChars: config.webMinTextChars,
    }),
    chunker: config.chunk,
    generation: { maxTokens: config.llmMaxTokens, temperature: config.llmTemperature },
    logger: logger.child("rag"),
  });

  logger.info("Service ready", {
    backend: vectorIndex.backend,
    embedding: embedder?.model ?? null,
    llm: llm?.model ?? null,
  });

  const shutdownTasks: Array<() => Promise<void>> = [close];

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(
      config.host,
      config.port,
      () => createAppServer(service),
      logger.child("http"),
    );
    shutdownTasks.unshift(stopHttpServer);
    logger.info(`MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    await runStdioServer(createAppServer(service));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", { error });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

// Stateless mode: every POST gets its own server and transport, nothing outlives the request.
async function runHttpServer(
  host: string,
  port: number,
  serverFactory: () => McpServer,
  logger: Logger,
): Promise<() => Promise<void>> {
  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ok: true }));
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method !== "POST") {
        writeJsonRpcError(res, 405, -32000, "Method not allowed");
        return;
      }

      const body = await readJsonBody(req);
      await handleMcpPost(req, res, body, serverFactory, logger);
    } catch (error) {
      logger.error("MCP request failed", { error });
      if (!res.headersSent) {
        writeJsonRpcError(
          res,
          500,
          -32603,
          error instanceof Error ? error.message : "Internal server error",
        );
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(port, host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  serverFactory: () => McpServer,
  logger: Logger,
) {
  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });

  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
      logger.warn("Failed to close per-request MCP server", { error });
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
