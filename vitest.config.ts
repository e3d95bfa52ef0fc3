import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      ORCH_API_KEY: "test-key",
      STORE_DRIVER: "memory",
    },
    testTimeout: 10000,
  },
});
