import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@tickweave/schemas": pkg("schemas"),
      "@tickweave/journal": pkg("journal"),
      "@tickweave/kernel": pkg("kernel"),
      "@tickweave/replay": pkg("replay"),
      "@tickweave/metrics": pkg("metrics"),
      "@tickweave/games": pkg("games"),
    },
  },
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 30000,
  },
});
