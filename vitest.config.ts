import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
    env: {
      STACKPILOT_LOG_LEVEL: "ERROR",
    },
  },
});
