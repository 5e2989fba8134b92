import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@boardline/chess-domain": fileURLToPath(new URL("./packages/chess-domain/src/index.ts", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"]
  }
});
