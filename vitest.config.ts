import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@c2r-deploy/engine": path.resolve(__dirname, "engine/src/index.ts"),
    },
  },
  test: {
    include: ["engine/tests/**/*.test.ts", "cli/tests/**/*.test.ts"],
    environment: "node",
  },
});
