import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { startServer } from "./app";
import { ProviderError } from "./errors";
import { RetrievalPipeline } from "./services/retrievalPipeline";
import { VectorRecordStore } from "./services/vectorRecordStore";
import { EchoChat, KeywordEmbeddings } from "./testing/fakeProviders";
import type { SourceDocument } from "./types/records";
import { setLogLevel } from "./utils/logger";

const documents: SourceDocument[] = [
  {
    id: "kb:billing",
    sourceKind: "notion",
    origin: "/exports/billing.md",
    title: "Billing",
    fetchedAt: "2026-02-01T00:00:00.000Z",
    text: "Invoices for billing are emailed on the first day of each month.",
  },
  {
    id: "kb:password",
    sourceKind: "web",
    origin: "https://help.example.test/password",
    title: "Password reset",
    fetchedAt: "2026-02-01T00:00:00.000Z",
    text: "Use the reset link on the sign-in page to choose a new password.",
  },
];

describe("HTTP server", () => {
  let storeDir: string;
  let embeddings: KeywordEmbeddings;
  let baseUrl: string;
  let close: () => Promise<void>;

  const post = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  beforeAll(() => {
    setLogLevel("silent");
  });

  afterAll(() => {
    setLogLevel("info");
  });

  beforeEach(async () => {
    storeDir = await fs.mkdtemp(path.join(os.tmpdir(), "helpdesk-http-"));
    embeddings = new KeywordEmbeddings();
    const store = await VectorRecordStore.open({ storeDir });
    const pipeline = new RetrievalPipeline({
      store,
      embeddings,
      chat: new EchoChat(),
      options: {
        chunkSize: 200,
        chunkOverlap: 20,
        embedBatchSize: 4,
        ingestConcurrency: 1,
        topK: 3,
        minScore: 0.1,
      },
    });
    await pipeline.ingest(documents);

    const server = await startServer(
      { pipeline, models: { llm: "test-llm", embeddings: "test-embed" } },
      0
    );
    baseUrl = `http://127.0.0.1:${server.port}`;
    close = server.close;
  });

  afterEach(async () => {
    await close();
    await fs.rm(storeDir, { recursive: true, force: true });
  });

  it("reports health with store statistics", async () => {
    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "ok",
      storeDir,
      models: { llm: "test-llm", embeddings: "test-embed" },
      records: 2,
      documents: 2,
      dimension: 6,
      indexed: 2,
    });
  });

  it("serves the chat page", async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/html");
    expect(await response.text()).toContain("<title>Helpdesk</title>");
  });

  it("answers questions with references", async () => {
    const response = await post("/api/chat", { question: "How do I reset my password?" });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      answer: "Answer from 1 passages",
      noContext: false,
      references: [
        {
          chunkId: "kb:password-0001",
          documentId: "kb:password",
          sourceKind: "web",
          title: "Password reset",
          origin: "https://help.example.test/password",
          snippet: documents[1].text,
        },
      ],
    });
  });

  it("flags answers without supporting context", async () => {
    const response = await post("/api/chat", { question: "Where is my parcel?" });

    expect(await response.json()).toEqual({
      answer: "Answer from 0 passages",
      noContext: true,
      references: [],
    });
  });

  it("rejects invalid chat requests", async () => {
    const empty = await post("/api/chat", { question: "   " });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({
      error: "question: question must not be empty",
    });

    const tooMany = await post("/api/chat", { question: "billing", topK: 50 });
    expect(tooMany.status).toBe(400);
  });

  it("maps provider failures to 502", async () => {
    embeddings.failWith = new ProviderError("quota exhausted", "quota", "fake");

    const response = await post("/api/chat", { question: "billing" });

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({ error: "quota exhausted" });
  });

  it("returns ranked search results", async () => {
    const response = await post("/api/search", { query: "invoice billing", topK: 5, minScore: 0 });

    expect(await response.json()).toMatchObject({
      results: [
        { documentId: "kb:billing", score: expect.closeTo(1, 6) },
        { documentId: "kb:password" },
      ],
    });
  });

  it("exposes knowledge-base tools over MCP", async () => {
    const client = new Client({ name: "test-client", version: "0.0.0" });
    const transport = new StreamableHTTPClientTransport(new URL(`${baseUrl}/messages`));

    await client.connect(transport);
    try {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name).sort()).toEqual([
        "ask_knowledge_base",
        "search_knowledge_base",
      ]);

      const progress: string[] = [];
      const result = await client.callTool(
        { name: "ask_knowledge_base", arguments: { question: "reset my password" } },
        undefined,
        {
          onprogress: (update) => {
            if (update.message) {
              progress.push(update.message);
            }
          },
        }
      );

      expect(progress).toEqual(["Answer from 1 passages"]);
      expect(result.content).toEqual([
        {
          type: "text",
          text: [
            "Answer from 1 passages",
            "",
            "References:",
            "[1] Password reset (https://help.example.test/password) score=1.000",
          ].join("\n"),
        },
      ]);
    } finally {
      await client.close();
    }
  });
});
