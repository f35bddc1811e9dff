import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["mcp-server/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
