import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["relctl/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
  },
});
