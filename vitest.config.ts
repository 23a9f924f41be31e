import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
    // PGlite boots a wasm Postgres per suite; give it room on slow runners.
    testTimeout: 20_000,
    hookTimeout: 30_000,
  },
});
