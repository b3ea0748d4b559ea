import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { describeError } from "../errors";
import type { RetrievalPipeline } from "../services/retrievalPipeline";
import type { Citation } from "../types/records";
import { createLogger } from "../utils/logger";

const logger = createLogger("tools");

const MAX_TOP_K = 20;
// Progress notifications are batched so long answers do not flood the session.
const PROGRESS_FLUSH_CHARS = 48;

const searchInputShape = {
  query: z.string().min(1).describe("Text to search the knowledge base for"),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
};

const askInputShape = {
  question: z.string().min(1).describe("Customer question to answer"),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
};

export const formatReferences = (citations: readonly Citation[]) =>
  citations
    .map(
      (citation, index) =>
        `[${index + 1}] ${citation.title} (${citation.origin}) score=${citation.score.toFixed(3)}`
    )
    .join("\n");

const errorResult = (action: string, error: unknown) => ({
  isError: true,
  content: [{ type: "text" as const, text: `Failed to ${action}: ${describeError(error)}` }],
});

export const registerKnowledgeBaseTools = (
  server: McpServer,
  pipeline: RetrievalPipeline
) => {
  server.registerTool(
    "search_knowledge_base",
    {
      title: "Search Knowledge Base",
      description:
        "Return the help-center passages most similar to a query, with their sources and scores",
      inputSchema: searchInputShape,
    },
    async ({ query, topK }) => {
      try {
        const results = await pipeline.search(query, { topK });
        return {
          content: [{ type: "text" as const, text: JSON.stringify({ results }, null, 2) }],
        };
      } catch (error) {
        logger.error("search_knowledge_base failed", { error: describeError(error) });
        return errorResult("search the knowledge base", error);
      }
    }
  );

  server.registerTool(
    "ask_knowledge_base",
    {
      title: "Ask Knowledge Base",
      description:
        "Answer a support question from the help-center knowledge base, citing the passages used",
      inputSchema: askInputShape,
    },
    async ({ question, topK }, extra) => {
      const progressToken = extra._meta?.progressToken;
      let progressCounter = 0;
      let pending = "";

      const flushProgress = async () => {
        if (progressToken === undefined || !pending.trim()) {
          pending = "";
          return;
        }

        progressCounter += 1;
        const message = pending;
        pending = "";
        await extra.sendNotification({
          method: "notifications/progress",
          params: { progressToken, progress: progressCounter, message },
        });
      };

      const onToken = async (token: string) => {
        pending += token;
        if (pending.length >= PROGRESS_FLUSH_CHARS) {
          await flushProgress();
        }
      };

      try {
        const { answer, citations, noContext } = await pipeline.ask(question, {
          topK,
          signal: extra.signal,
          onToken,
        });
        await flushProgress();

        const references = formatReferences(citations);
        const text = noContext
          ? answer
          : `${answer}\n\nReferences:\n${references}`;

        return { content: [{ type: "text" as const, text }] };
      } catch (error) {
        logger.error("ask_knowledge_base failed", { error: describeError(error) });
        return errorResult("answer the question", error);
      }
    }
  );
};
