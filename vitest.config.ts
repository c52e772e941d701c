import { defineConfig } from "vitest/config";

// Integration suites drain asynchronous controllers with a 1s close timeout
// and open SQLite files under the OS temp directory in their hooks.
export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "unit",
          include: ["packages/*/tests/unit/**/*.test.ts"],
          environment: "node",
          testTimeout: 5_000
        }
      },
      {
        test: {
          name: "integration",
          include: ["packages/*/tests/integration/**/*.test.ts"],
          environment: "node",
          testTimeout: 10_000,
          hookTimeout: 5_000
        }
      }
    ]
  }
});
