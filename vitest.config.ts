import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
    // sharp encodes and the CLI spawns take longer than the default
    testTimeout: 30_000,
  },
});
