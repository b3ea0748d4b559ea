import type { Server } from "node:http";
import { fileURLToPath } from "node:url";
import express from "express";
import cors from "cors";

import { createMcpServer } from "./mcp/serverFactory";
import { TransportManager } from "./mcp/transportManager";
import type { RetrievalPipeline } from "./services/retrievalPipeline";
import { setupChatRoutes } from "./routes/chatRoutes";
import { setupHealthRoutes, type ModelInfo } from "./routes/healthRoutes";
import { setupMcpRoutes } from "./routes/mcpRoutes";
import { createLogger } from "./utils/logger";

const logger = createLogger("app");

const PUBLIC_DIR = fileURLToPath(new URL("../public", import.meta.url));

export type AppDependencies = {
  pipeline: RetrievalPipeline;
  models: ModelInfo;
};

export const createApp = async ({ pipeline, models }: AppDependencies) => {
  // Load the store into memory before the first request arrives.
  const index = await pipeline.refresh();
  logger.info("Index ready", { records: index.size, dimension: index.dimension });

  const transportManager = new TransportManager(() => createMcpServer(pipeline));

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  setupMcpRoutes(app, transportManager);
  setupHealthRoutes(app, pipeline, models);
  setupChatRoutes(app, pipeline);
  app.use(express.static(PUBLIC_DIR));

  return { app, transportManager };
};

/** Resolves once the server is listening; port 0 picks a free port. */
export const startServer = async (deps: AppDependencies, port: number) => {
  const { app, transportManager } = await createApp(deps);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, () => resolve(listening));
    listening.once("error", reject);
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address ? address.port : port;

  const close = async () => {
    await transportManager.closeAll();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  };

  return { server, port: boundPort, close };
};
