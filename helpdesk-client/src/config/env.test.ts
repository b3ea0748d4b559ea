import { describe, expect, it } from "vitest";

import { loadConfig } from "./env";

describe("loadConfig", () => {
  it("uses the local server by default", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: "http://127.0.0.1:8000",
      messagesUrl: "http://127.0.0.1:8000/messages",
      sseUrl: "http://127.0.0.1:8000/sse",
      clientName: "kb-helpdesk-client",
      clientVersion: "0.1.0",
      requestTimeoutMs: 300_000,
    });
  });

  it("normalizes paths and ignores an invalid timeout", () => {
    const config = loadConfig({
      HELPDESK_SERVER_BASE_URL: "https://support.example.test/",
      HELPDESK_MESSAGES_PATH: "mcp/messages",
      HELPDESK_SSE_PATH: "",
      HELPDESK_REQUEST_TIMEOUT_MS: "soon",
    });

    expect(config.baseUrl).toBe("https://support.example.test");
    expect(config.messagesUrl).toBe("https://support.example.test/mcp/messages");
    expect(config.sseUrl).toBe("https://support.example.test/");
    expect(config.requestTimeoutMs).toBe(300_000);
  });
});
