import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    pool: "forks",
    testTimeout: 20000,
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
    },
  },
});
