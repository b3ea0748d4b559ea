import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";

import { loadConfig, type ClientConfig } from "../config/env";
import { createSplitFetch } from "../transport/splitFetch";

export const SEARCH_TOOL = "search_knowledge_base";
export const ASK_TOOL = "ask_knowledge_base";

export type ToolCallResponse = Awaited<ReturnType<Client["callTool"]>>;

const describe = (error: unknown) =>
  error instanceof Error ? error.message : JSON.stringify(error);

type TextBlock = { type: "text"; text: string };

const isTextBlock = (block: unknown): block is TextBlock =>
  typeof block === "object" &&
  block !== null &&
  "type" in block &&
  block.type === "text" &&
  "text" in block &&
  typeof block.text === "string";

/** First text block of a tool result, or the raw payload as JSON. */
export const extractTextResult = (result: ToolCallResponse): string => {
  const content: unknown = result.content;
  if (Array.isArray(content)) {
    const textBlock = content.find(isTextBlock);
    if (textBlock) {
      return textBlock.text;
    }
    return JSON.stringify(content, null, 2);
  }

  if (result.toolResult !== undefined) {
    return JSON.stringify(result.toolResult, null, 2);
  }

  return "<no content>";
};

export const isToolError = (result: ToolCallResponse) => result.isError === true;

export class McpHttpClient {
  private readonly config: ClientConfig;
  private readonly client: Client;
  private transport?: StreamableHTTPClientTransport;
  private connected = false;

  constructor(config: ClientConfig = loadConfig()) {
    this.config = config;
    this.client = new Client(
      {
        name: this.config.clientName,
        version: this.config.clientVersion,
      },
      {
        enforceStrictCapabilities: false,
      }
    );
  }

  private async ensureConnected() {
    if (this.connected) {
      return;
    }

    const transport = new StreamableHTTPClientTransport(
      new URL(this.config.messagesUrl),
      {
        fetch: createSplitFetch(this.config.messagesUrl, this.config.sseUrl),
      }
    );
    this.transport = transport;

    transport.onerror = (error: Error) => {
      if (error.name === "AbortError" || error.message.includes("AbortError")) {
        return;
      }
      console.error("[transport]", error.message);
    };

    try {
      await this.client.connect(transport);
      this.connected = true;
    } catch (error) {
      this.transport = undefined;
      await transport.close().catch((closeError: unknown) => {
        console.error("[transport] close failed:", describe(closeError));
      });

      const hint =
        `Failed to connect to the helpdesk server at ${this.config.baseUrl}. ` +
        `Is the server running and reachable? ` +
        `Set HELPDESK_SERVER_BASE_URL if it uses a different origin.`;

      throw new Error(`${hint}\nUnderlying error: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async listTools() {
    await this.ensureConnected();
    return this.client.listTools();
  }

  async searchKnowledgeBase(
    query: string,
    topK?: number,
    options?: RequestOptions
  ) {
    return this.callTool(SEARCH_TOOL, { query, topK }, options);
  }

  async askKnowledgeBase(
    question: string,
    topK?: number,
    options?: RequestOptions
  ) {
    return this.callTool(ASK_TOOL, { question, topK }, options);
  }

  async close() {
    if (this.transport) {
      await this.transport.close();
      this.transport = undefined;
    }
    if (this.connected) {
      await this.client.close();
      this.connected = false;
    }
  }

  private async callTool(
    name: string,
    args: Record<string, unknown>,
    options?: RequestOptions
  ) {
    await this.ensureConnected();
    const definedArgs = Object.fromEntries(
      Object.entries(args).filter(([, value]) => value !== undefined)
    );
    return this.client.callTool(
      { name, arguments: definedArgs },
      undefined,
      {
        timeout: this.config.requestTimeoutMs,
        ...options,
      }
    );
  }
}
