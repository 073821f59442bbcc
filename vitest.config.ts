import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources; no build step before tests.
    alias: {
      "@rpcforge/compiler": src("compiler"),
      "@rpcforge/emit": src("emit"),
      "@rpcforge/runtime": src("runtime"),
      "@rpcforge/cli": src("cli"),
    },
  },
});
