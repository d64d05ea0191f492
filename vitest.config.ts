import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["ingestor/tests/**/*.test.ts", "orchestrator/tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
