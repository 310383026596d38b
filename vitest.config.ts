import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Clears DEBUG and MIRROR_VERIFY_* so host settings don't leak into tests
    setupFiles: ["./tests/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        // Type-only files (no executable code)
        "src/types.ts",
        // Module index files (re-exports only)
        "src/commands/index.ts",
      ],
      reportsDirectory: "./coverage",
    },
    testTimeout: 30000,
    // Each test file gets its own process so module mocks and env changes stay isolated
    pool: "forks",
    teardownTimeout: 5000,
    hookTimeout: 30000,
  },
});
