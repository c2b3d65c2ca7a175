import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
    },
    env: {
      // Keep the developer's own prompt config out of test runs
      SHELLMARK_CONFIG: "",
      SHELLMARK_LOG_LEVEL: "",
    },
  },
});
