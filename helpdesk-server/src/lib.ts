export * from "./errors";
export type * from "./types/records";
export {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  chunkText,
  expectedChunkCount,
  normalizeText,
  reconstructText,
  validateChunking,
} from "./services/chunker";
export { VectorRecordStore, type StoreContext, type StoreStats } from "./services/vectorRecordStore";
export { SimilarityIndex } from "./services/similarityIndex";
export type { AnswerOptions, ChatProvider, EmbeddingProvider } from "./services/providers";
export { OllamaGateway, toProviderError } from "./services/ollamaGateway";
export {
  RetrievalPipeline,
  isIngestFailure,
  toCitation,
  toContextPassage,
  type AskOptions,
  type AskResult,
  type IngestDocumentOptions,
  type IngestFailure,
  type IngestManyOptions,
  type IngestReport,
  type IngestSummary,
  type PipelineOptions,
  type SearchOptions,
} from "./services/retrievalPipeline";
export type { DocumentSource } from "./sources/types";
export { WebCrawler, type PageFetcher, type WebCrawlerOptions } from "./sources/webCrawler";
export { NotionExportSource, type NotionExportOptions } from "./sources/notionExport";
export { loadEnv, type Env } from "./config/env";
export { buildSources, loadIngestConfig, parseIngestConfig, type IngestConfig } from "./config/ingestConfig";
export { createContext, type HelpdeskContext } from "./context";
export { createApp, startServer, type AppDependencies } from "./app";
export { createLogger, setLogLevel, type LogThreshold, type Logger } from "./utils/logger";
