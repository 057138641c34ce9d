import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

// Workspace packages resolve to their sources so tests need no build
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@assetlens/core": source("./packages/core/src/index.ts"),
      "@assetlens/scanners": source("./packages/scanners/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
  },
});
