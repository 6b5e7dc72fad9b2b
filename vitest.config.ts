import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/**/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000
  }
});
