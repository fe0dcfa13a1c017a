import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@orbitrag/sdk": fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url)),
      "@orbitrag/testkit": fileURLToPath(new URL("./packages/testkit/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      ORBITRAG_LOG_LEVEL: "silent",
    },
  },
});
