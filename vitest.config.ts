import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const root = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/src/**/*.test.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["./packages/core/src/__tests__/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: ["**/node_modules/**", "**/dist/**", "**/*.d.ts", "**/__tests__/**"],
    },
  },
  resolve: {
    alias: {
      "@picks/types": root("./packages/types/src"),
      "@picks/core": root("./packages/core/src"),
    },
  },
});
