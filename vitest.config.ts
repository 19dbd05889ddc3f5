import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    env: {
      LLM_GATEWAY_LOG_LEVEL: "silent",
    },
    testTimeout: 10000,
  },
});
