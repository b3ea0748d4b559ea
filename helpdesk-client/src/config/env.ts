import "dotenv/config";

export type ClientConfig = {
  baseUrl: string;
  messagesUrl: string;
  sseUrl: string;
  clientName: string;
  clientVersion: string;
  requestTimeoutMs: number;
};

const DEFAULT_BASE_URL = "http://127.0.0.1:8000";
const DEFAULT_MESSAGES_PATH = "/messages";
const DEFAULT_SSE_PATH = "/sse";
const DEFAULT_CLIENT_NAME = "kb-helpdesk-client";
const DEFAULT_CLIENT_VERSION = "0.1.0";
const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes

const normalizePath = (value: string) => {
  if (!value.trim()) {
    return "/";
  }
  return value.startsWith("/") ? value : `/${value}`;
};

export const loadConfig = (
  source: NodeJS.ProcessEnv = process.env
): ClientConfig => {
  const base = (source.HELPDESK_SERVER_BASE_URL || DEFAULT_BASE_URL).trim();
  const messagesPath = normalizePath(
    source.HELPDESK_MESSAGES_PATH ?? DEFAULT_MESSAGES_PATH
  );
  const ssePath = normalizePath(source.HELPDESK_SSE_PATH ?? DEFAULT_SSE_PATH);

  const baseUrl = new URL(base);
  const messagesUrl = new URL(messagesPath, baseUrl);
  const sseUrl = new URL(ssePath, baseUrl);

  const requestTimeoutMs = Number(
    source.HELPDESK_REQUEST_TIMEOUT_MS || DEFAULT_TIMEOUT_MS
  );

  return {
    baseUrl: baseUrl.toString().replace(/\/$/, ""),
    messagesUrl: messagesUrl.toString(),
    sseUrl: sseUrl.toString(),
    clientName: source.HELPDESK_CLIENT_NAME || DEFAULT_CLIENT_NAME,
    clientVersion: DEFAULT_CLIENT_VERSION,
    requestTimeoutMs:
      Number.isFinite(requestTimeoutMs) && requestTimeoutMs > 0
        ? requestTimeoutMs
        : DEFAULT_TIMEOUT_MS,
  };
};
