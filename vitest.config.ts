// vitest.config.ts — Vitest configuration for unit tests (node environment).

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
});
