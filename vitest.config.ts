import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["./tests/setup.ts"],
    env: {
      LOG_LEVEL: "error",
      LOG_TO_FILE: "false",
    },
    pool: "threads",
    testTimeout: 10000,
    hookTimeout: 10000,
    sequence: {
      shuffle: true,
    },
  },
});
