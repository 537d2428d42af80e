// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest configuration for every workspace package and service (no infrastructure required).
 * Scope: Unit and adapter tests only; DB and RPC are faked in-process.
 * Invariants: Coverage disabled by default; workspace packages resolve through their package.json exports.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: ["**/tests/**", "**/index.ts", "**/*.config.*"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
