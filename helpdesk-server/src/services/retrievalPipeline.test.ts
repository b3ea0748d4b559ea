import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AbortError, ConfigError, IngestError, ProviderError } from "../errors";
import { KeywordEmbeddings } from "../testing/fakeProviders";
import type { ContextPassage, SourceDocument } from "../types/records";
import type { AnswerOptions, ChatProvider } from "./providers";
import {
  RetrievalPipeline,
  isIngestFailure,
  type PipelineOptions,
} from "./retrievalPipeline";
import { VectorRecordStore } from "./vectorRecordStore";

class RecordingChat implements ChatProvider {
  calls: Array<{
    question: string;
    context: readonly ContextPassage[];
    options?: AnswerOptions;
  }> = [];

  async answer(
    question: string,
    context: readonly ContextPassage[],
    options?: AnswerOptions
  ): Promise<string> {
    this.calls.push({ question, context, options });
    await options?.onToken?.("answer");
    return `answer from ${context.length} passages`;
  }
}

const options: PipelineOptions = {
  chunkSize: 40,
  chunkOverlap: 10,
  embedBatchSize: 2,
  ingestConcurrency: 2,
  topK: 3,
  minScore: 0.1,
};

const doc = (id: string, text: string, title = `Title ${id}`): SourceDocument => ({
  id,
  sourceKind: "notion",
  origin: `/exports/${id}.md`,
  title,
  fetchedAt: "2026-02-01T00:00:00.000Z",
  text,
});

describe("RetrievalPipeline", () => {
  let storeDir: string;
  let store: VectorRecordStore;
  let embeddings: KeywordEmbeddings;
  let chat: RecordingChat;
  let pipeline: RetrievalPipeline;

  beforeEach(async () => {
    storeDir = await fs.mkdtemp(path.join(os.tmpdir(), "helpdesk-pipeline-"));
    store = await VectorRecordStore.open({ storeDir });
    embeddings = new KeywordEmbeddings();
    chat = new RecordingChat();
    pipeline = new RetrievalPipeline({ store, embeddings, chat, options });
  });

  afterEach(async () => {
    await fs.rm(storeDir, { recursive: true, force: true });
  });

  it("chunks, embeds in batches and stores every chunk", async () => {
    const text = "x".repeat(100);
    const report = await pipeline.ingestDocument(doc("a", text));

    // 100 chars, size 40, stride 30: [0,40) [30,70) [60,100)
    expect(report).toEqual({ documentId: "a", title: "Title a", chunks: 3, replaced: 0 });
    expect(embeddings.calls.map((batch) => batch.length)).toEqual([2, 1]);

    const records = await store.loadAll();
    expect(records.map((r) => [r.chunk.startOffset, r.chunk.endOffset])).toEqual([
      [0, 40],
      [30, 70],
      [60, 100],
    ]);
    expect(records[0].document).toEqual({
      id: "a",
      sourceKind: "notion",
      origin: "/exports/a.md",
      title: "Title a",
      fetchedAt: "2026-02-01T00:00:00.000Z",
    });
  });

  it("normalizes whitespace before chunking", async () => {
    await pipeline.ingestDocument(doc("a", "  reset   your\n\npassword  "));

    const [record] = await store.loadAll();
    expect(record.chunk.text).toBe("reset your password");
  });

  it("fails the whole document when one batch fails and writes nothing", async () => {
    embeddings.failOnCall = 2;

    const error = await pipeline
      .ingestDocument(doc("a", "y".repeat(100)))
      .then(() => null, (reason: unknown) => reason);

    expect(error).toBeInstanceOf(IngestError);
    if (error instanceof IngestError) {
      expect(error.documentId).toBe("a");
      expect(error.batchIndex).toBe(1);
      expect(error.cause).toBeInstanceOf(ProviderError);
    }
    expect(await store.loadAll()).toEqual([]);
  });

  it("replaces previous chunks when a document is ingested again", async () => {
    await pipeline.ingestDocument(doc("a", "billing questions"));
    await pipeline.ingestDocument(doc("b", "shipping questions"));
    const report = await pipeline.ingestDocument(doc("a", "invoice questions"));

    const records = await store.loadAll();
    expect(report.replaced).toBe(1);
    expect(records.map((r) => r.chunk.text)).toEqual([
      "shipping questions",
      "invoice questions",
    ]);
  });

  it("stops before writing when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      pipeline.ingestDocument(doc("a", "billing"), { signal: controller.signal })
    ).rejects.toBeInstanceOf(AbortError);
    expect(await store.loadAll()).toEqual([]);
  });

  it("reports per-document outcomes for a batch ingest", async () => {
    const seen: string[] = [];
    embeddings.failOnCall = 1;

    const summary = await pipeline.ingest(
      [doc("a", "billing"), doc("b", "shipping"), doc("c", "reset")],
      {
        concurrency: 1,
        onDocument: (outcome) =>
          seen.push(`${outcome.documentId}:${isIngestFailure(outcome) ? "failed" : "ok"}`),
      }
    );

    expect(seen).toEqual(["a:failed", "b:ok", "c:ok"]);
    expect(summary.failed.map((f) => f.documentId)).toEqual(["a"]);
    expect(summary.succeeded.map((r) => r.documentId)).toEqual(["b", "c"]);
  });

  it("keeps the partial summary when the source fails midway", async () => {
    const seen: Array<string | null> = [];
    async function* crawl() {
      yield doc("page-1", "billing");
      throw new Error("page 2 could not be parsed");
    }

    const summary = await pipeline.ingest(crawl(), {
      onDocument: (outcome) => seen.push(outcome.documentId),
    });

    expect(summary.succeeded.map((r) => r.documentId)).toEqual(["page-1"]);
    expect(summary.failed).toHaveLength(1);
    expect(summary.failed[0].documentId).toBeNull();
    expect(summary.failed[0].error.message).toBe("page 2 could not be parsed");
    expect([...seen].sort()).toEqual([null, "page-1"].sort());
    expect(store.stats().documents).toBe(1);
  });

  it("rejects batch sizes and concurrency that are not positive integers", () => {
    expect(
      () => new RetrievalPipeline({ store, embeddings, chat, options: { ...options, embedBatchSize: 0 } })
    ).toThrow(ConfigError);
    expect(
      () => new RetrievalPipeline({ store, embeddings, chat, options: { ...options, ingestConcurrency: 1.5 } })
    ).toThrow(
      "Invalid pipeline options: ingestConcurrency must be a positive integer (got 1.5)"
    );
  });

  it("accepts async iterables of documents", async () => {
    async function* source() {
      yield doc("a", "billing");
      yield doc("b", "invoice");
    }

    const summary = await pipeline.ingest(source());

    expect(summary.succeeded.map((r) => r.documentId).sort()).toEqual(["a", "b"]);
    expect(store.stats().documents).toBe(2);
  });

  it("answers with ranked citations", async () => {
    await pipeline.ingestDocument(doc("billing", "billing and invoice help", "Billing"));
    await pipeline.ingestDocument(doc("account", "password reset steps", "Account"));
    await pipeline.ingestDocument(doc("ship", "shipping times", "Shipping"));

    const tokens: string[] = [];
    const result = await pipeline.ask("How do I reset my password?", {
      onToken: (token) => {
        tokens.push(token);
      },
    });

    expect(result.noContext).toBe(false);
    expect(result.citations[0]).toMatchObject({
      documentId: "account",
      title: "Account",
      origin: "/exports/account.md",
      startOffset: 0,
      endOffset: 20,
      text: "password reset steps",
    });
    expect(result.citations.map((c) => c.documentId)).toEqual(["account"]);
    expect(result.answer).toBe("answer from 1 passages");
    expect(tokens).toEqual(["answer"]);
    expect(chat.calls[0].context[0].citation.chunkId).toBe("account-0001");
    expect(chat.calls[0].options?.noContext).toBe(false);
  });

  it("still asks the chat provider when nothing clears the threshold", async () => {
    await pipeline.ingestDocument(doc("ship", "shipping times"));

    const result = await pipeline.ask("billing question", { minScore: 0.5 });

    expect(result).toEqual({
      answer: "answer from 0 passages",
      citations: [],
      noContext: true,
    });
    expect(chat.calls).toHaveLength(1);
    expect(chat.calls[0].options?.noContext).toBe(true);
  });

  it("returns an empty search on an empty store without calling the provider", async () => {
    expect(await pipeline.search("anything")).toEqual([]);
    expect(embeddings.calls).toEqual([]);
  });

  it("surfaces provider failures at query time", async () => {
    await pipeline.ingestDocument(doc("a", "billing"));
    const failing = vi
      .spyOn(embeddings, "embed")
      .mockRejectedValueOnce(new ProviderError("offline", "network", "fake"));

    await expect(pipeline.ask("billing?")).rejects.toBeInstanceOf(ProviderError);
    expect(chat.calls).toEqual([]);
    failing.mockRestore();
  });

  it("picks up writes made after the index was built", async () => {
    await pipeline.ingestDocument(doc("a", "billing"));
    expect(await pipeline.search("invoice")).toEqual([]);

    await pipeline.ingestDocument(doc("b", "invoice"));

    expect((await pipeline.search("invoice")).map((c) => c.documentId)).toEqual(["b"]);
    expect(pipeline.stats()).toMatchObject({ records: 2, documents: 2, indexed: 2 });
  });
});
