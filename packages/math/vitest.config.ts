import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@terse/math",
    globals: true,
    environment: "node",
  },
});
