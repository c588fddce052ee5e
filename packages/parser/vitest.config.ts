import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@odata-literal/parser",
    environment: "node",
  },
});
