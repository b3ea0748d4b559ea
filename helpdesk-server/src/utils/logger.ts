import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

let threshold: LogThreshold = "info";

export const setLogLevel = (level: LogThreshold) => {
  threshold = level;
};

export function log(
  level: LogLevel,
  scope: string,
  message: string,
  data?: Record<string, unknown>
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] ${LEVEL_COLOR[level](
    `[${level.toUpperCase()}]`
  )} ${chalk.dim(`[${scope}]`)}`;
  const write = level === "error" || level === "warn" ? console.error : console.log;

  if (data) {
    write(`${prefix} ${message}`, JSON.stringify(data));
  } else {
    write(`${prefix} ${message}`);
  }
}

export type Logger = {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

export const createLogger = (scope: string): Logger => ({
  debug: (message, data) => log("debug", scope, message, data),
  info: (message, data) => log("info", scope, message, data),
  warn: (message, data) => log("warn", scope, message, data),
  error: (message, data) => log("error", scope, message, data),
});
