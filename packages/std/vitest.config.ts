import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@terse/std",
    globals: true,
    environment: "node",
  },
});
