import path from "node:path";

import type { Env } from "./config/env";
import type { ModelInfo } from "./routes/healthRoutes";
import { OllamaGateway } from "./services/ollamaGateway";
import { RetrievalPipeline } from "./services/retrievalPipeline";
import { VectorRecordStore } from "./services/vectorRecordStore";
import { setLogLevel } from "./utils/logger";

export type HelpdeskContext = {
  env: Env;
  store: VectorRecordStore;
  pipeline: RetrievalPipeline;
  models: ModelInfo;
};

export const createContext = async (
  env: Env,
  overrides: { storeDir?: string; chunkSize?: number; chunkOverlap?: number } = {}
): Promise<HelpdeskContext> => {
  setLogLevel(env.logLevel);

  const resolvedEnv: Env = {
    ...env,
    storeDir: overrides.storeDir ? path.resolve(overrides.storeDir) : env.storeDir,
    chunkSize: overrides.chunkSize ?? env.chunkSize,
    chunkOverlap: overrides.chunkOverlap ?? env.chunkOverlap,
  };

  const store = await VectorRecordStore.open({
    storeDir: resolvedEnv.storeDir,
    embeddingModel: resolvedEnv.embeddingModel,
  });
  const gateway = new OllamaGateway({
    host: resolvedEnv.ollamaHost,
    llmModel: resolvedEnv.ollamaModel,
    embeddingModel: resolvedEnv.embeddingModel,
    timeoutMs: resolvedEnv.providerTimeoutMs,
  });
  const pipeline = new RetrievalPipeline({
    store,
    embeddings: gateway,
    chat: gateway,
    options: {
      chunkSize: resolvedEnv.chunkSize,
      chunkOverlap: resolvedEnv.chunkOverlap,
      embedBatchSize: resolvedEnv.embedBatchSize,
      ingestConcurrency: resolvedEnv.ingestConcurrency,
      topK: resolvedEnv.topK,
      minScore: resolvedEnv.minScore,
    },
  });

  return { env: resolvedEnv, store, pipeline, models: gateway.models };
};
