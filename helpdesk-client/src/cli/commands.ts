import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import type { Progress } from "@modelcontextprotocol/sdk/types.js";

import {
  McpHttpClient,
  extractTextResult,
  isToolError,
  type ToolCallResponse,
} from "../mcp/client";

const withClient = async (
  runner: (client: McpHttpClient) => Promise<void>
): Promise<void> => {
  const client = new McpHttpClient();
  try {
    await runner(client);
  } finally {
    await client.close();
  }
};

const parseTopK = (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 20) {
    throw new InvalidArgumentError("Expected an integer between 1 and 20.");
  }
  return parsed;
};

// Answer tokens arrive as progress messages; print them inline as they stream.
const printProgress = (progress: Progress) => {
  if (progress.message) {
    process.stdout.write(chalk.dim(progress.message));
  }
};

const printResult = (result: ToolCallResponse, json?: boolean) => {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (isToolError(result)) {
    console.error(chalk.red(extractTextResult(result)));
  } else {
    console.log(extractTextResult(result));
  }

  if (isToolError(result)) {
    process.exitCode = 1;
  }
};

export const buildCli = () => {
  const program = new Command();

  program
    .name("helpdesk-client")
    .description("Query a running helpdesk server over MCP");

  program
    .command("list-tools")
    .description("List tools exposed by the helpdesk server")
    .action(async () => {
      await withClient(async (client) => {
        const response = await client.listTools();
        if (!response.tools.length) {
          console.log("No tools reported by the server.");
          return;
        }

        for (const tool of response.tools) {
          const description = tool.description ? ` - ${tool.description}` : "";
          console.log(`${chalk.green(tool.name)}${description}`);
        }
      });
    });

  program
    .command("ask")
    .description("Answer a question with the ask_knowledge_base tool")
    .requiredOption("-q, --question <text>", "Question to ask the knowledge base")
    .option("-k, --top-k <n>", "Passages to retrieve", parseTopK)
    .option("--json", "Print the raw JSON response")
    .action(async (opts: { question: string; topK?: number; json?: boolean }) => {
      await withClient(async (client) => {
        const result = await client.askKnowledgeBase(opts.question, opts.topK, {
          onprogress: opts.json ? undefined : printProgress,
          resetTimeoutOnProgress: true,
        });

        if (!opts.json) {
          process.stdout.write("\n\n");
        }
        printResult(result, opts.json);
      });
    });

  program
    .command("search")
    .description("Retrieve passages with the search_knowledge_base tool")
    .requiredOption("-q, --query <text>", "Text to search for")
    .option("-k, --top-k <n>", "Passages to retrieve", parseTopK)
    .option("--json", "Print the raw JSON response")
    .action(async (opts: { query: string; topK?: number; json?: boolean }) => {
      await withClient(async (client) => {
        const result = await client.searchKnowledgeBase(opts.query, opts.topK);
        printResult(result, opts.json);
      });
    });

  return program;
};
