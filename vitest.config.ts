import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@dealcheck/shared-utils": path.resolve(__dirname, "shared-utils/src/index.ts"),
      "@dealcheck/evaluator": path.resolve(__dirname, "evaluator/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["*/tests/**/*.test.ts"],
  },
});
