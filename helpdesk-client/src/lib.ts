export { loadConfig, type ClientConfig } from "./config/env";
export {
  ASK_TOOL,
  McpHttpClient,
  SEARCH_TOOL,
  extractTextResult,
  isToolError,
  type ToolCallResponse,
} from "./mcp/client";
export { createSplitFetch } from "./transport/splitFetch";
