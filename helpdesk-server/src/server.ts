import { loadEnv } from "./config/env";
import { createContext } from "./context";
import { runServer } from "./runServer";

const bootstrap = async () => {
  await runServer(await createContext(loadEnv()));
};

bootstrap().catch((error) => {
  console.error("Failed to start helpdesk server:", error);
  process.exit(1);
});
