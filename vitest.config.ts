import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      // Resolve workspace packages to their sources so vitest can follow their deps
      "@feedsieve/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url),
      ),
      "@feedsieve/worker": fileURLToPath(
        new URL("./packages/worker/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    // Let vitest resolve transitive deps from workspace packages
    server: {
      deps: {
        inline: [/^@feedsieve\//, "zod", "neo4j-driver"],
      },
    },
  },
});
