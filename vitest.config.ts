import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["stratactl/test/**/*.test.ts"],
    testTimeout: 20000,
  },
});
