import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // PGlite boots a full Postgres in WASM per test file
    hookTimeout: 30000,
    testTimeout: 30000,
  },
});
