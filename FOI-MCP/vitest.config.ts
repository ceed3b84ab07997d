import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "foi-mcp",
    environment: "node",
    setupFiles: ["tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
  },
});
