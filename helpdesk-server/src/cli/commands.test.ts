import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import chalk from "chalk";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";

import type { Env } from "../config/env";
import type { HelpdeskContext } from "../context";
import { ConfigError } from "../errors";
import { RetrievalPipeline } from "../services/retrievalPipeline";
import { VectorRecordStore } from "../services/vectorRecordStore";
import { EchoChat, KeywordEmbeddings } from "../testing/fakeProviders";
import { setLogLevel } from "../utils/logger";
import { buildCli } from "./commands";

describe("helpdesk CLI", () => {
  let root: string;
  let exportDir: string;
  let output: string;
  let env: Env;

  const sink = () =>
    new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        output += chunk.toString();
        callback();
      },
    });

  const createContext = async (
    contextEnv: Env,
    overrides: { storeDir?: string; chunkSize?: number; chunkOverlap?: number }
  ): Promise<HelpdeskContext> => {
    const storeDir = overrides.storeDir ?? contextEnv.storeDir;
    const store = await VectorRecordStore.open({ storeDir });
    const pipeline = new RetrievalPipeline({
      store,
      embeddings: new KeywordEmbeddings(),
      chat: new EchoChat(),
      options: {
        chunkSize: overrides.chunkSize ?? contextEnv.chunkSize,
        chunkOverlap: overrides.chunkOverlap ?? contextEnv.chunkOverlap,
        embedBatchSize: contextEnv.embedBatchSize,
        ingestConcurrency: contextEnv.ingestConcurrency,
        topK: contextEnv.topK,
        minScore: contextEnv.minScore,
      },
    });
    return {
      env: { ...contextEnv, storeDir },
      store,
      pipeline,
      models: { llm: "test-llm", embeddings: "test-embed" },
    };
  };

  const run = async (...args: string[]) => {
    output = "";
    const program = buildCli({ loadEnv: () => env, createContext, output: sink() });
    program.exitOverride();
    await program.parseAsync(["node", "helpdesk", ...args]);
    return output;
  };

  beforeAll(() => {
    setLogLevel("silent");
    chalk.level = 0;
  });

  afterAll(() => {
    setLogLevel("info");
  });

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "helpdesk-cli-"));
    exportDir = path.join(root, "export");
    await fs.mkdir(exportDir);
    await fs.writeFile(
      path.join(exportDir, "billing.md"),
      "# Billing\nInvoices for billing are emailed monthly."
    );
    await fs.writeFile(
      path.join(exportDir, "password.md"),
      "# Password reset\nUse the reset link to change your password."
    );

    env = {
      port: 0,
      storeDir: path.join(root, "default-store"),
      ollamaHost: "http://127.0.0.1:11434",
      ollamaModel: "test-llm",
      embeddingModel: "test-embed",
      chunkSize: 200,
      chunkOverlap: 20,
      topK: 3,
      minScore: 0.1,
      embedBatchSize: 4,
      ingestConcurrency: 2,
      providerTimeoutMs: 1000,
      logLevel: "silent",
    };
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it("ingests a Notion export and answers from it", async () => {
    const storeDir = path.join(root, "store");

    const ingestOutput = await run("--store-dir", storeDir, "ingest", "--notion-path", exportDir, "--notion-id", "kb");
    const lines = ingestOutput.trim().split("\n");

    expect(lines[0]).toBe(`Ingesting notion source ${exportDir}`);
    expect(lines).toContain("✓ kb:billing 1 chunks");
    expect(lines).toContain("✓ kb:password 1 chunks");
    expect(lines.at(-1)).toBe("2 ingested, 0 failed; store holds 2 records from 2 documents");

    const askOutput = await run("--store-dir", storeDir, "ask", "-q", "How do I reset my password?");
    expect(askOutput).toBe(
      [
        "Answer from 1 passages",
        "",
        "Sources:",
        `[1] Password reset (${path.join(exportDir, "password.md")}) score=1.000`,
        "",
      ].join("\n")
    );
  });

  it("prints search results as JSON", async () => {
    await run("--store-dir", root, "ingest", "--notion-path", exportDir);

    const searchOutput = await run("--store-dir", root, "search", "-q", "invoice", "--json");
    const { results } = JSON.parse(searchOutput);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      documentId: "notion:billing",
      title: "Billing",
      startOffset: 0,
    });
  });

  it("reports stats and clears the store", async () => {
    await run("ingest", "--notion-path", exportDir);

    const statsOutput = await run("stats");
    expect(statsOutput).toContain("Records    2\n");
    expect(statsOutput).toContain("Models     test-embed / test-llm\n");

    expect(await run("clear")).toBe("Removed 2 records.\n");
    expect(await run("stats")).toContain("Records    0\n");
  });

  it("clears a store whose record file is corrupt", async () => {
    const storeDir = path.join(root, "corrupt");
    await fs.mkdir(storeDir);
    await fs.writeFile(path.join(storeDir, "records.jsonl"), "{not json\n");

    expect(await run("--store-dir", storeDir, "clear")).toBe("Removed 0 records.\n");
    await expect(fs.access(path.join(storeDir, "records.jsonl"))).rejects.toThrow();
  });

  it("replaces earlier records of a re-ingested document", async () => {
    await run("ingest", "--notion-path", exportDir);
    const again = await run("ingest", "--notion-path", exportDir);

    expect(again).toContain("✓ notion:billing 1 chunks, replaced 1\n");
    expect(again.trim().split("\n").at(-1)).toBe(
      "2 ingested, 0 failed; store holds 2 records from 2 documents"
    );
  });

  it("refuses to ingest without any source", async () => {
    await expect(run("ingest")).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("helpdesk bin", () => {
  it("runs its TypeScript entry point through tsx", async () => {
    const manifest: unknown = JSON.parse(
      await fs.readFile(new URL("../../package.json", import.meta.url), "utf8")
    );
    expect(manifest).toMatchObject({ bin: { helpdesk: "src/cli.ts" } });

    const entry = await fs.readFile(new URL("../cli.ts", import.meta.url), "utf8");
    expect(entry.split("\n")[0]).toBe("#!/usr/bin/env -S npx tsx");
  });
});
