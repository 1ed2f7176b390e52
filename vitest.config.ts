import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["apps/*/src/__tests__/**/*.test.ts", "packages/*/src/__tests__/**/*.test.ts"],
    // Runs before test collection, so env vars are set before the logger loads
    setupFiles: ["./apps/outreach/test/setup-env.ts"],
    testTimeout: 10000,
  },
});
