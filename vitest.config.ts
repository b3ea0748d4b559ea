import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["helpdesk-server/src/**/*.test.ts", "helpdesk-client/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
  },
});
