import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    env: {
      NODE_ENV: "test",
    },
    testTimeout: 20000,
  },
});
