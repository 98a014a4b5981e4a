import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      reportsDirectory: "./coverage",

      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,

        "src/modules/header-security/**": {
          branches: 95,
          functions: 95,
          lines: 95,
          statements: 95,
        },
      },

      exclude: [
        "node_modules/**",
        "**/*.test.ts",
        "**/*.d.ts",
        "src/index.ts",
      ],

      include: ["src/**/*.ts"],
    },
  },
});
