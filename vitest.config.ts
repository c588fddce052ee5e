import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages resolve to their TypeScript sources, not dist/
const alias = {
  "@odata-literal/parser": fileURLToPath(new URL("./packages/parser/src/index.ts", import.meta.url)),
  "@odata-literal/grammar": fileURLToPath(
    new URL("./packages/grammar/src/index.ts", import.meta.url)
  ),
};

export default defineConfig({
  test: {
    projects: [
      // Root-level tests: configuration, logging, CLI and packaging
      {
        resolve: { alias },
        test: {
          name: "odata-literal",
          include: ["tests/**/*.test.ts"],
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
