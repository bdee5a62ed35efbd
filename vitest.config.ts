import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/integration/**/*.test.ts"],
    globals: false,
    testTimeout: 10_000,
  },
});
