import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["backend/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
