import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@daybook/types": packageEntry("types"),
      "@daybook/store": packageEntry("store"),
      "@daybook/ledger": packageEntry("ledger"),
      "@daybook/node": packageEntry("node"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/node/src/main.ts"],
      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
