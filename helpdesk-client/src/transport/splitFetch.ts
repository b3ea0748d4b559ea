import type { FetchLike } from "@modelcontextprotocol/sdk/shared/transport.js";

/**
 * Routes GET requests (the server-to-client event stream) to `sseUrl` and
 * every other method to `messagesUrl`. The streamable HTTP transport expects
 * one URL for all three methods; the helpdesk server splits them.
 */
export const createSplitFetch = (
  messagesUrl: string,
  sseUrl: string,
  baseFetch: FetchLike = (input, init) => globalThis.fetch(input, init)
): FetchLike => {
  const normalizedMessagesUrl = new URL(messagesUrl).toString();
  const normalizedSseUrl = new URL(sseUrl).toString();

  return async (_input, init = {}) => {
    const method = (init.method ?? "GET").toUpperCase();
    const target = method === "GET" ? normalizedSseUrl : normalizedMessagesUrl;

    return baseFetch(target, { ...init, method });
  };
};
