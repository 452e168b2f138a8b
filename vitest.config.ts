import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@xdr-lsp/parser": resolve(packagesRoot, "parser/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    pool: "threads",
  },
});
