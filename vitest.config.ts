import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],

    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["src/core/**/*.ts", "src/utils/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/bin/**",
        "src/core/contracts/**",
        "src/utils/ui.ts", // Display-only formatting helpers
      ],
    },

    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
