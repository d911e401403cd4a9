import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        // Barrel re-export files
        "src/index.ts",
        "src/*/index.ts",
      ],
    },
  },
});
