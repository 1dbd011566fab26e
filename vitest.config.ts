import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    // Each compile builds a TypeScript program over the bundled libs.
    testTimeout: 60_000,
    hookTimeout: 60_000,
  },
});
