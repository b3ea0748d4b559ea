import {
  ConfigError,
  IngestError,
  ProviderError,
  describeError,
  throwIfAborted,
} from "../errors";
import type {
  Citation,
  ContextPassage,
  DocumentMeta,
  PendingRecord,
  RetrievalResult,
  SourceDocument,
} from "../types/records";
import { createLogger } from "../utils/logger";
import { chunkText, normalizeText, validateChunking } from "./chunker";
import type { ChatProvider, EmbeddingProvider } from "./providers";
import { SimilarityIndex } from "./similarityIndex";
import type { StoreStats, VectorRecordStore } from "./vectorRecordStore";

export type PipelineOptions = {
  chunkSize: number;
  chunkOverlap: number;
  embedBatchSize: number;
  ingestConcurrency: number;
  topK: number;
  minScore: number;
};

type PipelineDependencies = {
  store: VectorRecordStore;
  embeddings: EmbeddingProvider;
  chat: ChatProvider;
  options: PipelineOptions;
};

export type IngestDocumentOptions = {
  replace?: boolean;
  signal?: AbortSignal;
};

export type IngestReport = {
  documentId: string;
  title: string;
  chunks: number;
  replaced: number;
};

/** `documentId` is null when the source itself failed to produce a document. */
export type IngestFailure = {
  documentId: string | null;
  error: Error;
};

export type IngestSummary = {
  succeeded: IngestReport[];
  failed: IngestFailure[];
};

export type IngestManyOptions = IngestDocumentOptions & {
  concurrency?: number;
  onDocument?: (outcome: IngestReport | IngestFailure) => void;
};

export type SearchOptions = {
  topK?: number;
  minScore?: number;
};

export type AskOptions = SearchOptions & {
  signal?: AbortSignal;
  onToken?: (token: string) => void | Promise<void>;
};

export type AskResult = {
  answer: string;
  citations: Citation[];
  noContext: boolean;
};

const logger = createLogger("pipeline");

export const toCitation = ({ record, score }: RetrievalResult): Citation => ({
  chunkId: record.chunk.chunkId,
  documentId: record.document.id,
  sourceKind: record.document.sourceKind,
  title: record.document.title,
  origin: record.document.origin,
  startOffset: record.chunk.startOffset,
  endOffset: record.chunk.endOffset,
  score,
  text: record.chunk.text,
});

export const toContextPassage = ({ text, ...citation }: Citation): ContextPassage => ({
  text,
  citation,
});

export const isIngestFailure = (
  outcome: IngestReport | IngestFailure
): outcome is IngestFailure => "error" in outcome;

const validatePipelineOptions = ({
  chunkSize,
  chunkOverlap,
  embedBatchSize,
  ingestConcurrency,
}: PipelineOptions) => {
  validateChunking(chunkSize, chunkOverlap);

  const issues: string[] = [];
  if (!Number.isInteger(embedBatchSize) || embedBatchSize < 1) {
    issues.push(`embedBatchSize must be a positive integer (got ${embedBatchSize})`);
  }
  if (!Number.isInteger(ingestConcurrency) || ingestConcurrency < 1) {
    issues.push(`ingestConcurrency must be a positive integer (got ${ingestConcurrency})`);
  }
  if (issues.length) {
    throw new ConfigError("Invalid pipeline options", issues);
  }
};

const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(describeError(error));

const batchesOf = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
};

/**
 * Ingest: normalize → chunk → embed (batched) → assemble → commit.
 * Query: embed question → search index → cite → answer.
 */
export class RetrievalPipeline {
  private readonly store: VectorRecordStore;
  private readonly embeddings: EmbeddingProvider;
  private readonly chat: ChatProvider;
  private readonly options: PipelineOptions;
  private index: SimilarityIndex | null = null;
  private rebuilding: Promise<SimilarityIndex> | null = null;
  private generation = 0;

  constructor({ store, embeddings, chat, options }: PipelineDependencies) {
    validatePipelineOptions(options);
    this.store = store;
    this.embeddings = embeddings;
    this.chat = chat;
    this.options = options;
  }

  async ingestDocument(
    document: SourceDocument,
    { replace = true, signal }: IngestDocumentOptions = {}
  ): Promise<IngestReport> {
    const { text: rawText, ...meta } = document;
    const text = normalizeText(rawText);
    const chunks = chunkText(
      text,
      this.options.chunkSize,
      this.options.chunkOverlap,
      meta.id
    );
    const batches = batchesOf(chunks, this.options.embedBatchSize);
    const records: PendingRecord[] = [];

    for (const [batchIndex, batch] of batches.entries()) {
      throwIfAborted(signal);

      let vectors: number[][];
      try {
        vectors = await this.embeddings.embed(batch.map((chunk) => chunk.text));
      } catch (error) {
        throw new IngestError(meta.id, batchIndex, error);
      }

      if (vectors.length !== batch.length) {
        throw new IngestError(
          meta.id,
          batchIndex,
          new ProviderError(
            `Embedding provider returned ${vectors.length} vectors for ${batch.length} texts`,
            "invalid_response",
            "embeddings"
          )
        );
      }

      batch.forEach((chunk, i) => {
        records.push({ chunk, vector: vectors[i], document: this.documentMeta(meta) });
      });
    }

    throwIfAborted(signal);

    let replaced = 0;
    try {
      if (replace) {
        replaced = await this.store.replaceDocument(meta.id, records);
      } else {
        await this.store.append(records);
      }
    } catch (error) {
      throw new IngestError(meta.id, null, error);
    }

    if (replaced > 0 || records.length > 0) {
      this.invalidate();
    }

    logger.info("Ingested document", {
      documentId: meta.id,
      chunks: records.length,
      replaced,
    });

    return {
      documentId: meta.id,
      title: meta.title,
      chunks: records.length,
      replaced,
    };
  }

  async ingest(
    documents: Iterable<SourceDocument> | AsyncIterable<SourceDocument>,
    {
      concurrency = this.options.ingestConcurrency,
      onDocument,
      ...documentOptions
    }: IngestManyOptions = {}
  ): Promise<IngestSummary> {
    const summary: IngestSummary = { succeeded: [], failed: [] };
    const iterator = this.toAsyncIterator(documents);
    let sourceFailed = false;

    // Workers pull from one shared iterator; each document is independent.
    const worker = async () => {
      for (;;) {
        if (sourceFailed || documentOptions.signal?.aborted) {
          return;
        }

        let next: IteratorResult<SourceDocument>;
        try {
          next = await iterator.next();
        } catch (error) {
          sourceFailed = true;
          const failure: IngestFailure = { documentId: null, error: toError(error) };
          summary.failed.push(failure);
          logger.error("Document source failed", { error: failure.error.message });
          onDocument?.(failure);
          return;
        }
        if (next.done) {
          return;
        }

        let outcome: IngestReport | IngestFailure;
        try {
          outcome = await this.ingestDocument(next.value, documentOptions);
          summary.succeeded.push(outcome);
        } catch (error) {
          outcome = { documentId: next.value.id, error: toError(error) };
          summary.failed.push(outcome);
          logger.error("Document ingest failed", {
            documentId: next.value.id,
            error: outcome.error.message,
          });
        }
        onDocument?.(outcome);
      }
    };

    const settled = await Promise.allSettled(
      Array.from({ length: Math.max(1, concurrency) }, () => worker())
    );
    // Only a throwing onDocument callback gets here.
    for (const result of settled) {
      if (result.status === "rejected") {
        throw result.reason;
      }
    }

    if (documentOptions.signal?.aborted) {
      logger.warn("Ingest aborted", {
        succeeded: summary.succeeded.length,
        failed: summary.failed.length,
      });
    }

    return summary;
  }

  async search(
    question: string,
    { topK = this.options.topK, minScore = this.options.minScore }: SearchOptions = {}
  ): Promise<Citation[]> {
    const index = await this.ensureIndex();
    if (index.size === 0 || topK <= 0) {
      return [];
    }

    const [queryVector] = await this.embedQuery(question);
    return index.search(queryVector, topK, minScore).map(toCitation);
  }

  async ask(
    question: string,
    { signal, onToken, ...searchOptions }: AskOptions = {}
  ): Promise<AskResult> {
    throwIfAborted(signal);
    const citations = await this.search(question, searchOptions);
    const noContext = citations.length === 0;

    if (noContext) {
      logger.warn("No supporting context found", { question });
    }

    const answer = await this.chat.answer(
      question,
      citations.map(toContextPassage),
      { signal, onToken, noContext }
    );

    return { answer, citations, noContext };
  }

  /** Reloads the store and swaps in a fresh index. */
  async refresh(): Promise<SimilarityIndex> {
    this.invalidate();
    return this.ensureIndex();
  }

  stats(): StoreStats & { indexed: number | null } {
    return { ...this.store.stats(), indexed: this.index?.size ?? null };
  }

  private async embedQuery(question: string): Promise<number[][]> {
    const vectors = await this.embeddings.embed([question]);
    if (vectors.length !== 1) {
      throw new ProviderError(
        `Embedding provider returned ${vectors.length} vectors for the query`,
        "invalid_response",
        "embeddings"
      );
    }
    return vectors;
  }

  private async ensureIndex(): Promise<SimilarityIndex> {
    if (this.index) {
      return this.index;
    }
    if (this.rebuilding) {
      return this.rebuilding;
    }

    const generation = this.generation;
    const rebuild = this.store
      .loadAll()
      .then((records) => {
        const index = SimilarityIndex.build(records);
        if (generation === this.generation) {
          this.index = index;
        }
        logger.debug("Index rebuilt", { records: index.size });
        return index;
      })
      .finally(() => {
        if (this.rebuilding === rebuild) {
          this.rebuilding = null;
        }
      });

    this.rebuilding = rebuild;
    return rebuild;
  }

  private invalidate() {
    this.generation += 1;
    this.index = null;
    this.rebuilding = null;
  }

  private documentMeta(meta: DocumentMeta): DocumentMeta {
    return {
      id: meta.id,
      sourceKind: meta.sourceKind,
      origin: meta.origin,
      title: meta.title,
      fetchedAt: meta.fetchedAt,
    };
  }

  private toAsyncIterator(
    documents: Iterable<SourceDocument> | AsyncIterable<SourceDocument>
  ): AsyncIterator<SourceDocument> {
    if (Symbol.asyncIterator in documents) {
      return documents[Symbol.asyncIterator]();
    }
    const iterator = documents[Symbol.iterator]();
    return {
      next: async () => iterator.next(),
    };
  }
}
