import readline from "node:readline";
import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";

import { loadEnv as loadEnvFromProcess, type Env } from "../config/env";
import { buildSources, loadIngestConfig, parseIngestConfig } from "../config/ingestConfig";
import { createContext as createDefaultContext, type HelpdeskContext } from "../context";
import { ConfigError } from "../errors";
import { runServer } from "../runServer";
import { isIngestFailure, type IngestFailure, type IngestReport } from "../services/retrievalPipeline";
import type { Citation } from "../types/records";

type ContextOverrides = { storeDir?: string; chunkSize?: number; chunkOverlap?: number };

export type CliDependencies = {
  loadEnv: () => Env;
  createContext: (env: Env, overrides: ContextOverrides) => Promise<HelpdeskContext>;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

type GlobalOptions = { storeDir?: string };

type IngestOptions = {
  config?: string;
  webUrl?: string;
  maxPages: number;
  delay: number;
  allowedPath?: string[];
  notionPath?: string;
  notionId: string;
  replace: boolean;
};

const integer = (min: number, max = Number.MAX_SAFE_INTEGER) => (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
  }
  return parsed;
};

const decimal = (min: number, max: number) => (value: string) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new InvalidArgumentError(`Expected a number between ${min} and ${max}.`);
  }
  return parsed;
};

const collect = (value: string, previous: string[] = []) => [...previous, value];

export const formatCitation = (citation: Citation, index: number) =>
  `${chalk.green(`[${index + 1}]`)} ${citation.title} ${chalk.dim(
    `(${citation.origin}) score=${citation.score.toFixed(3)}`
  )}`;

const formatOutcome = (outcome: IngestReport | IngestFailure) =>
  isIngestFailure(outcome)
    ? `${chalk.red("✗")} ${outcome.documentId ?? "source"} ${chalk.red(outcome.error.message)}`
    : `${chalk.green("✓")} ${outcome.documentId} ${chalk.dim(
        `${outcome.chunks} chunks${outcome.replaced ? `, replaced ${outcome.replaced}` : ""}`
      )}`;

export const buildCli = (overrides: Partial<CliDependencies> = {}) => {
  const deps: CliDependencies = {
    loadEnv: loadEnvFromProcess,
    createContext: createDefaultContext,
    input: process.stdin,
    output: process.stdout,
    ...overrides,
  };

  const print = (line = "") => {
    deps.output.write(`${line}\n`);
  };

  const program = new Command();

  program
    .name("helpdesk")
    .description("Ingest help-center content and answer questions from a local vector store")
    .option("-s, --store-dir <dir>", "Store directory (defaults to STORE_DIR)");

  const openContext = (extra: ContextOverrides = {}) => {
    const { storeDir } = program.opts<GlobalOptions>();
    return deps.createContext(deps.loadEnv(), { storeDir, ...extra });
  };

  program
    .command("ingest")
    .description("Fetch documents, embed them and write them to the store")
    .option("-c, --config <file>", "Ingest config file (JSON)")
    .option("--web-url <url>", "Crawl a help-center site starting at this URL")
    .option("--max-pages <n>", "Page limit for --web-url", integer(1), 50)
    .option("--delay <seconds>", "Delay between page requests", decimal(0, 60), 0.5)
    .option("--allowed-path <prefix>", "Only follow links under this path (repeatable)", collect)
    .option("--notion-path <path>", "Notion export directory or file")
    .option("--notion-id <id>", "Id prefix for Notion documents", "notion")
    .option("--no-replace", "Append without removing earlier records of the same document")
    .action(async (opts: IngestOptions) => {
      const env = deps.loadEnv();
      const defaults = { chunkSize: env.chunkSize, chunkOverlap: env.chunkOverlap };
      const fileConfig = opts.config
        ? await loadIngestConfig(opts.config, defaults)
        : parseIngestConfig({}, defaults);

      const web = [...fileConfig.web];
      if (opts.webUrl) {
        web.push({
          url: opts.webUrl,
          maxPages: opts.maxPages,
          delay: opts.delay,
          allowedPaths: opts.allowedPath,
        });
      }
      const notion = [...fileConfig.notion];
      if (opts.notionPath) {
        notion.push({ path: opts.notionPath, id: opts.notionId });
      }

      const sources = buildSources({ web, notion });
      if (sources.length === 0) {
        throw new ConfigError("Nothing to ingest", [
          "pass --config, --web-url or --notion-path",
        ]);
      }

      const { pipeline } = await openContext({
        chunkSize: fileConfig.chunkSize,
        chunkOverlap: fileConfig.chunkOverlap,
      });

      let succeeded = 0;
      let failed = 0;
      for (const source of sources) {
        print(chalk.bold(`Ingesting ${source.kind} source ${source.label}`));
        const summary = await pipeline.ingest(source.documents(), {
          replace: opts.replace,
          onDocument: (outcome) => print(formatOutcome(outcome)),
        });
        succeeded += summary.succeeded.length;
        failed += summary.failed.length;
      }

      const stats = pipeline.stats();
      print(
        `${chalk.green(`${succeeded} ingested`)}, ${
          failed ? chalk.red(`${failed} failed`) : "0 failed"
        }; store holds ${stats.records} records from ${stats.documents} documents`
      );

      if (failed > 0) {
        process.exitCode = 1;
      }
    });

  program
    .command("ask")
    .description("Answer a question from the knowledge base")
    .requiredOption("-q, --question <text>", "Question to answer")
    .option("-k, --top-k <n>", "Passages to retrieve", integer(1, 20))
    .option("--json", "Print the answer and citations as JSON")
    .action(async (opts: { question: string; topK?: number; json?: boolean }) => {
      const { pipeline } = await openContext();
      let streamed = false;
      const result = await pipeline.ask(opts.question, {
        topK: opts.topK,
        onToken: opts.json
          ? undefined
          : (token) => {
              streamed = true;
              deps.output.write(token);
            },
      });

      if (opts.json) {
        print(JSON.stringify(result, null, 2));
        return;
      }

      print(streamed ? "" : result.answer);
      if (result.citations.length) {
        print();
        print(chalk.bold("Sources:"));
        result.citations.forEach((citation, index) => print(formatCitation(citation, index)));
      }
    });

  program
    .command("search")
    .description("List the passages most similar to a query")
    .requiredOption("-q, --query <text>", "Text to search for")
    .option("-k, --top-k <n>", "Passages to retrieve", integer(1, 100))
    .option("--min-score <score>", "Minimum cosine similarity", decimal(-1, 1))
    .option("--json", "Print results as JSON")
    .action(
      async (opts: { query: string; topK?: number; minScore?: number; json?: boolean }) => {
        const { pipeline } = await openContext();
        const results = await pipeline.search(opts.query, {
          topK: opts.topK,
          minScore: opts.minScore,
        });

        if (opts.json) {
          print(JSON.stringify({ results }, null, 2));
          return;
        }
        if (!results.length) {
          print(chalk.yellow("No matching passages."));
          return;
        }

        results.forEach((citation, index) => {
          print(formatCitation(citation, index));
          print(chalk.dim(`    ${citation.text.replace(/\s+/g, " ").slice(0, 200)}`));
        });
      }
    );

  program
    .command("chat")
    .description("Ask questions interactively; an empty line or `exit` quits")
    .option("-k, --top-k <n>", "Passages to retrieve", integer(1, 20))
    .action(async (opts: { topK?: number }) => {
      const { pipeline } = await openContext();
      const rl = readline.createInterface({
        input: deps.input,
        output: deps.output,
        terminal: false,
      });

      print(chalk.dim("Ask a question. Empty line or `exit` to quit."));
      deps.output.write(chalk.cyan("> "));

      for await (const line of rl) {
        const question = line.trim();
        if (!question || question === "exit" || question === "quit") {
          break;
        }

        let streamed = false;
        const result = await pipeline.ask(question, {
          topK: opts.topK,
          onToken: (token) => {
            streamed = true;
            deps.output.write(token);
          },
        });
        print(streamed ? "" : result.answer);
        result.citations.forEach((citation, index) => print(formatCitation(citation, index)));
        print();
        deps.output.write(chalk.cyan("> "));
      }

      rl.close();
    });

  program
    .command("stats")
    .description("Show store statistics")
    .action(async () => {
      const { pipeline, models } = await openContext();
      await pipeline.refresh();
      const stats = pipeline.stats();
      print(`${chalk.bold("Store")}      ${stats.storeDir}`);
      print(`${chalk.bold("Records")}    ${stats.records}`);
      print(`${chalk.bold("Documents")}  ${stats.documents}`);
      print(`${chalk.bold("Dimension")}  ${stats.dimension ?? "-"}`);
      print(`${chalk.bold("Models")}     ${models.embeddings} / ${models.llm}`);
    });

  program
    .command("clear")
    .description("Delete every record in the store")
    .action(async () => {
      const { store } = await openContext();
      const { records } = store.stats();
      await store.clear();
      print(chalk.green(`Removed ${records} records.`));
    });

  program
    .command("serve")
    .description("Start the HTTP and MCP server")
    .addOption(new Option("-p, --port <port>", "Port to listen on").argParser(integer(0, 65535)))
    .action(async (opts: { port?: number }) => {
      const context = await openContext();
      await runServer(context, opts.port);
    });

  return program;
};
