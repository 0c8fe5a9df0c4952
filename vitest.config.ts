/**
 * Vitest configuration
 *
 * Unit tests live under tests/unit and share the environment reset in
 * tests/setup.ts. AWS clients are replaced with aws-sdk-client-mock and the
 * file system with memfs, so nothing leaves the test process.
 *
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
    setupFiles: ["./tests/setup.ts"],
    restoreMocks: true,
    testTimeout: 30_000,

    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/*.d.ts", "**/*.config.*"],
    },
  },
});
