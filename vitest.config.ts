// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - this makes MARL_* settings available to tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      testTimeout: 10_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
