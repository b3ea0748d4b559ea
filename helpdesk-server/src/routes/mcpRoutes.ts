import type { Express, Request, Response } from "express";

import { describeError } from "../errors";
import type { TransportManager } from "../mcp/transportManager";
import { createLogger } from "../utils/logger";

const logger = createLogger("mcp");

const HTTP_ERROR = {
  invalidSession: {
    status: 400,
    payload: {
      jsonrpc: "2.0",
      error: { code: -32000, message: "Invalid session. Initialize first." },
      id: null,
    },
  },
  internal: {
    status: 500,
    payload: {
      jsonrpc: "2.0",
      error: { code: -32603, message: "Internal server error" },
      id: null,
    },
  },
};

export const setupMcpRoutes = (
  app: Express,
  transportManager: TransportManager
) => {
  // GET opens the notification stream, DELETE ends the session.
  const handleSessionRequest =
    (label: string, failure: string) => async (req: Request, res: Response) => {
      const sessionId = req.header("mcp-session-id");

      if (!sessionId) {
        res
          .status(HTTP_ERROR.invalidSession.status)
          .send("Missing mcp-session-id header");
        return;
      }

      const transport = transportManager.get(sessionId);

      if (!transport) {
        res.status(HTTP_ERROR.invalidSession.status).send("Unknown session");
        return;
      }

      try {
        await transport.handleRequest(req, res);
      } catch (error) {
        logger.error(`${label} failed`, { sessionId, error: describeError(error) });

        if (!res.headersSent) {
          res.status(500).end(failure);
        }
      }
    };

  app.post("/messages", async (req, res) => {
    try {
      const transport = await transportManager.ensureTransport(req);

      if (!transport) {
        res
          .status(HTTP_ERROR.invalidSession.status)
          .json(HTTP_ERROR.invalidSession.payload);
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error("POST /messages failed", { error: describeError(error) });

      if (!res.headersSent) {
        res
          .status(HTTP_ERROR.internal.status)
          .json(HTTP_ERROR.internal.payload);
      }
    }
  });

  app.get("/sse", handleSessionRequest("GET /sse", "SSE failure"));
  app.delete(
    "/messages",
    handleSessionRequest("DELETE /messages", "Failed to close session")
  );
};
