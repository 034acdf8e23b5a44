import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    coverage: {
      clean: true,
      reporter: ["json-summary", "html", "lcov", "text"],
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
    },
  },
});
