import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@terse/core",
    globals: true,
    environment: "node",
  },
});
