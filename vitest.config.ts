import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@argroute\/sdk\/testing$/, replacement: fromRoot("./packages/sdk/src/testing/index.ts") },
      { find: /^@argroute\/sdk$/, replacement: fromRoot("./packages/sdk/src/index.ts") },
      { find: /^@argroute\/shared$/, replacement: fromRoot("./packages/shared/src/index.ts") },
      { find: /^@argroute\/core$/, replacement: fromRoot("./packages/core/src/index.ts") },
    ],
  },
});
