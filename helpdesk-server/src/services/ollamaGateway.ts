import { Ollama, type AbortableAsyncIterator, type ChatResponse } from "ollama";

import { AbortError, ProviderError, type ProviderErrorKind } from "../errors";
import type { ContextPassage, EmbeddingVector } from "../types/records";
import { createLogger } from "../utils/logger";
import {
  SYSTEM_PROMPT,
  buildUserPrompt,
  type AnswerOptions,
  type ChatProvider,
  type EmbeddingProvider,
} from "./providers";

type GatewayConfig = {
  host: string;
  llmModel: string;
  embeddingModel: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

const PROVIDER = "ollama";
const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const logger = createLogger("ollama");

const readField = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null && key in value
    ? Reflect.get(value, key)
    : undefined;

const classify = (error: unknown): ProviderErrorKind => {
  const status = readField(error, "status_code");
  if (status === 401 || status === 403) {
    return "auth";
  }
  if (status === 429) {
    return "quota";
  }

  const code = readField(error, "code") ?? readField(readField(error, "cause"), "code");
  if (typeof code === "string" && NETWORK_CODES.has(code)) {
    return "network";
  }
  if (error instanceof TypeError && /fetch failed|network/i.test(error.message)) {
    return "network";
  }
  return "unknown";
};

export const toProviderError = (error: unknown, action: string): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`${action}: ${message}`, classify(error), PROVIDER, {
    cause: error,
  });
};

/** Races `task` against a timer; on timeout `controller` cancels the request. */
const withTimeout = async <T>(
  task: Promise<T>,
  timeoutMs: number,
  action: string,
  controller: AbortController
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ProviderError(
          `${action}: timed out after ${timeoutMs}ms`,
          "timeout",
          PROVIDER
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export class OllamaGateway implements EmbeddingProvider, ChatProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: GatewayConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  get models() {
    return {
      llm: this.config.llmModel,
      embeddings: this.config.embeddingModel,
    };
  }

  /** A client whose every request is cancelled when `signal` aborts. */
  private clientFor(signal: AbortSignal): Ollama {
    const baseFetch = this.fetchImpl;
    return new Ollama({
      host: this.config.host,
      fetch: (input, init) =>
        baseFetch(input, {
          ...init,
          signal: init?.signal ? AbortSignal.any([init.signal, signal]) : signal,
        }),
    });
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return [];
    }

    const action = `Failed to create embeddings via Ollama (${this.config.embeddingModel}) at ${this.config.host}`;

    const controller = new AbortController();
    let embeddings: number[][];
    try {
      const response = await withTimeout(
        this.clientFor(controller.signal).embed({
          model: this.config.embeddingModel,
          input: texts,
        }),
        this.config.timeoutMs,
        action,
        controller
      );
      embeddings = response.embeddings;
    } catch (error) {
      throw toProviderError(error, action);
    }

    if (embeddings.length !== texts.length) {
      throw new ProviderError(
        `${action}: expected ${texts.length} vectors, received ${embeddings.length}`,
        "invalid_response",
        PROVIDER
      );
    }
    if (embeddings.some((vector) => vector.length === 0)) {
      throw new ProviderError(
        `${action}: embedding vector is empty. Is the model loaded in Ollama?`,
        "invalid_response",
        PROVIDER
      );
    }

    logger.debug("Embedded batch", {
      texts: texts.length,
      dimension: embeddings[0]?.length ?? 0,
    });
    return embeddings;
  }

  async answer(
    question: string,
    context: readonly ContextPassage[],
    { signal, onToken, noContext = context.length === 0 }: AnswerOptions = {}
  ): Promise<string> {
    const action = `Failed to generate an answer via Ollama (${this.config.llmModel}) at ${this.config.host}`;
    const systemPrompt = noContext
      ? `${SYSTEM_PROMPT} No supporting context was found; say so before answering.`
      : SYSTEM_PROMPT;

    if (signal?.aborted) {
      throw new AbortError("Request aborted before generation started");
    }

    const controller = new AbortController();
    const cancel = () => controller.abort();
    signal?.addEventListener("abort", cancel);

    let stream: AbortableAsyncIterator<ChatResponse>;
    try {
      stream = await withTimeout(
        this.clientFor(controller.signal).chat({
          model: this.config.llmModel,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: buildUserPrompt(question, context) },
          ],
          stream: true,
          keep_alive: "5m",
          options: {
            temperature: 0.2,
            num_ctx: 8192,
          },
        }),
        this.config.timeoutMs,
        action,
        controller
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError("Answer generation aborted");
      }
      throw toProviderError(error, action);
    } finally {
      signal?.removeEventListener("abort", cancel);
    }

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      stream.abort();
    }, this.config.timeoutMs);
    const abortHandler = () => stream.abort();
    signal?.addEventListener("abort", abortHandler);

    let accumulator = "";

    try {
      for await (const chunk of stream) {
        const token = chunk.message?.content ?? "";

        if (!token) {
          continue;
        }

        accumulator += token;
        await onToken?.(token);
      }
    } catch (error) {
      if (timedOut) {
        throw new ProviderError(
          `${action}: timed out after ${this.config.timeoutMs}ms`,
          "timeout",
          PROVIDER,
          { cause: error }
        );
      }
      if (signal?.aborted) {
        throw new AbortError("Answer generation aborted");
      }
      throw toProviderError(error, action);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", abortHandler);
    }

    // An aborted stream may end quietly instead of throwing.
    if (timedOut) {
      throw new ProviderError(
        `${action}: timed out after ${this.config.timeoutMs}ms`,
        "timeout",
        PROVIDER
      );
    }
    if (signal?.aborted) {
      throw new AbortError("Answer generation aborted");
    }

    return accumulator.trim();
  }
}
