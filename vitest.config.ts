import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/unit/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    clearMocks: true,
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
