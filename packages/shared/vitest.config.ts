import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "src/**/*.test.ts",
        "**/*.d.ts",
        "**/*.config.*",
      ],
    },
    include: ["src/**/*.{test,spec}.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
