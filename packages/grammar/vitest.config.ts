import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@odata-literal/parser": fileURLToPath(new URL("../parser/src/index.ts", import.meta.url)),
    },
  },
  test: {
    name: "@odata-literal/grammar",
    environment: "node",
  },
});
