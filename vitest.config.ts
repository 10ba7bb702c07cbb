import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/test/**/*.test.ts"],
    // The self-test and CLI tests create scratch directories on disk.
    testTimeout: 30000,
  },
});
