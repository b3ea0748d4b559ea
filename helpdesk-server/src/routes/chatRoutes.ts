import type { Express, Request, Response } from "express";
import { z } from "zod";

import { ProviderError, describeError } from "../errors";
import type { RetrievalPipeline } from "../services/retrievalPipeline";
import type { Citation } from "../types/records";
import { createLogger } from "../utils/logger";

const logger = createLogger("http");

const chatSchema = z.object({
  question: z.string().trim().min(1, "question must not be empty"),
  topK: z.number().int().min(1).max(20).optional(),
});

const searchSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  topK: z.number().int().min(1).max(20).optional(),
  minScore: z.number().min(-1).max(1).optional(),
});

export type Reference = Omit<Citation, "text"> & { snippet: string };

const SNIPPET_CHARS = 280;

export const toReference = ({ text, ...citation }: Citation): Reference => ({
  ...citation,
  snippet: text.length > SNIPPET_CHARS ? `${text.slice(0, SNIPPET_CHARS)}…` : text,
});

const validationMessage = (error: z.ZodError) => {
  const { formErrors, fieldErrors } = error.flatten();
  const fields = Object.entries(fieldErrors).map(
    ([field, messages]) => `${field}: ${(messages ?? []).join(", ")}`
  );
  return [...formErrors, ...fields].join("; ");
};

const statusFor = (error: unknown) => (error instanceof ProviderError ? 502 : 500);

/** Aborts when the client goes away before the response is finished. */
const abortOnDisconnect = (res: Response) => {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
};

export const setupChatRoutes = (app: Express, pipeline: RetrievalPipeline) => {
  app.post("/api/chat", async (req: Request, res: Response) => {
    const parsed = chatSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) });
      return;
    }

    try {
      const { answer, citations, noContext } = await pipeline.ask(
        parsed.data.question,
        { topK: parsed.data.topK, signal: abortOnDisconnect(res) }
      );
      res.json({ answer, noContext, references: citations.map(toReference) });
    } catch (error) {
      logger.error("POST /api/chat failed", { error: describeError(error) });
      if (!res.headersSent) {
        res.status(statusFor(error)).json({ error: describeError(error) });
      }
    }
  });

  app.post("/api/chat/stream", async (req: Request, res: Response) => {
    const parsed = chatSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) });
      return;
    }

    req.socket.setTimeout(0);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const sendEvent = (event: string, data: unknown) => {
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    try {
      const { answer, citations, noContext } = await pipeline.ask(
        parsed.data.question,
        {
          topK: parsed.data.topK,
          signal: abortOnDisconnect(res),
          onToken: (delta) => sendEvent("progress", { delta }),
        }
      );
      sendEvent("done", { answer, noContext, references: citations.map(toReference) });
    } catch (error) {
      logger.error("POST /api/chat/stream failed", { error: describeError(error) });
      sendEvent("error", { message: describeError(error) });
    } finally {
      res.end();
    }
  });

  app.post("/api/search", async (req: Request, res: Response) => {
    const parsed = searchSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) });
      return;
    }

    try {
      const results = await pipeline.search(parsed.data.query, {
        topK: parsed.data.topK,
        minScore: parsed.data.minScore,
      });
      res.json({ results: results.map(toReference) });
    } catch (error) {
      logger.error("POST /api/search failed", { error: describeError(error) });
      res.status(statusFor(error)).json({ error: describeError(error) });
    }
  });
};
