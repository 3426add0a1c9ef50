import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["./tests/vitest.setup.ts"],
    // sqlite3 is a native addon; keep each file in its own process
    pool: "forks",
    env: {
      NODE_ENV: "test",
    },
  },
});
