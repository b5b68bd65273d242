import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov"],
    },
    // Workspace packages are consumed from their TypeScript sources.
    alias: {
      "@tessera/runtime": workspace("./packages/runtime/src/index.ts"),
      "@tessera/compiler": workspace("./packages/compiler/src/index.ts"),
    },
  },
});
