import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "analyzer",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 20000,
    globals: true,
  },
});
