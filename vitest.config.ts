// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Deep-recursion tests need room on slower machines
    testTimeout: 30_000,
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});
