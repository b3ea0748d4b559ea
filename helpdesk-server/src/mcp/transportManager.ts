import { randomUUID } from "node:crypto";
import type { Request } from "express";

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";

import { describeError } from "../errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("mcp");

type Session = {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
};

export class TransportManager {
  private sessions = new Map<string, Session>();

  constructor(private readonly createServer: () => McpServer) {}

  private createSession(): Session {
    const server = this.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { transport, server });
        logger.info("Session initialized", { sessionId });
      },
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;

      if (sessionId && this.sessions.delete(sessionId)) {
        logger.info("Session closed", { sessionId });
        server.close().catch((error: unknown) => {
          logger.warn("Failed to close MCP server", {
            sessionId,
            error: describeError(error),
          });
        });
      }
    };

    return { transport, server };
  }

  async ensureTransport(
    req: Request
  ): Promise<StreamableHTTPServerTransport | null> {
    const sessionId = req.header("mcp-session-id");

    if (sessionId) {
      return this.sessions.get(sessionId)?.transport ?? null;
    }

    if (isInitializeRequest(req.body)) {
      const { transport, server } = this.createSession();
      await server.connect(transport);
      return transport;
    }

    return null;
  }

  get(sessionId: string) {
    return this.sessions.get(sessionId)?.transport;
  }

  async closeAll() {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    // Closing a server also closes its transport.
    await Promise.all(sessions.map(({ server }) => server.close()));
  }
}
