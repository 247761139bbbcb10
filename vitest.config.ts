import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/tests/**/*.test.ts", "sdks/*/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 30000,
  },
});
