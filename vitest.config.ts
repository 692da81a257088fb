import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Resolve @rss-courier/shared to its source so vitest can follow its deps
      "@rss-courier/shared": path.resolve(root, "packages/shared/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    server: {
      deps: {
        inline: [/^@rss-courier\//, "zod"],
      },
    },
  },
});
