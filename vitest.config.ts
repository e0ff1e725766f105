import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["monitor/tests/**/*.test.ts", "cli/tests/**/*.test.{ts,tsx}"],
    environment: "node",
  },
});
