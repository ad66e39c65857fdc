import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@autostage/sdk": fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "lcov", "json-summary"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/bin/**", "packages/*/test/**", "**/*.d.ts"],
      thresholds: {
        statements: 65,
        branches: 55,
        functions: 70,
        lines: 65
      }
    }
  }
});
