// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace's unit tests.
 * Scope: Core and service tests run in one pass. No Docker daemon or network required.
 * Invariants: Coverage disabled by default; v8 provider for Node.js compatibility.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: Workspace packages resolve through npm workspaces to their TypeScript sources.
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["lcov", "json-summary", "text", "html"],
      reportsDirectory: "coverage",
      exclude: [
        "node_modules/",
        "**/tests/",
        "dist/",
        "**/*.d.ts",
        "**/*.config.*",
        "**/index.ts",
      ],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
