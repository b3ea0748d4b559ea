import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { RetrievalPipeline } from "../services/retrievalPipeline";
import { registerKnowledgeBaseTools } from "../controllers/toolController";

export const SERVER_INFO = {
  name: "kb-helpdesk",
  version: "0.1.0",
  title: "Knowledge Base Helpdesk",
};

/** One MCP server per session; every instance shares the same pipeline. */
export const createMcpServer = (pipeline: RetrievalPipeline) => {
  const server = new McpServer(SERVER_INFO, {
    capabilities: {
      tools: { listChanged: true },
      logging: {},
    },
  });
  registerKnowledgeBaseTools(server, pipeline);
  return server;
};
