import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      OUTPUT_DIR: "./data/test-output",
      LOG_LEVEL: "error",
      NODE_ENV: "test",
    },
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
  },
});
