import type { Express } from "express";

import type { RetrievalPipeline } from "../services/retrievalPipeline";

export type ModelInfo = {
  llm: string;
  embeddings: string;
};

export const setupHealthRoutes = (
  app: Express,
  pipeline: RetrievalPipeline,
  models: ModelInfo
) => {
  app.get("/healthz", (_req, res) => {
    const { storeDir, records, documents, dimension, indexed } = pipeline.stats();
    res.json({
      status: "ok",
      storeDir,
      models,
      records,
      documents,
      dimension,
      indexed,
    });
  });
};
