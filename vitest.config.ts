import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/tests/**/*.spec.ts"],
    testTimeout: 10_000,
    env: { LOG_LEVEL: "error" }
  }
});
