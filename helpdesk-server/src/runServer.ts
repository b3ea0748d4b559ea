import { startServer } from "./app";
import type { HelpdeskContext } from "./context";
import { describeError } from "./errors";
import { createLogger } from "./utils/logger";

const logger = createLogger("server");

/** Starts the HTTP/MCP server and closes it on SIGINT or SIGTERM. */
export const runServer = async (
  { env, pipeline, models }: Pick<HelpdeskContext, "env" | "pipeline" | "models">,
  port = env.port
) => {
  const { port: boundPort, close } = await startServer(
    { pipeline, models },
    port
  );

  logger.info(`Helpdesk server listening on http://localhost:${boundPort}`, {
    storeDir: env.storeDir,
    ...models,
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", { error: describeError(error) });
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};
