import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      TAKE_FINDER_LOG_LEVEL: "silent",
    },
  },
});
