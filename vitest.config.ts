import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePackage = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@castra/core": resolvePackage("./packages/core/src/index.ts"),
      "@castra/testkit": resolvePackage("./packages/testkit/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
