import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts", "src/**/*.spec.ts"],
    setupFiles: ["tests/setup.ts"],
  },
});
