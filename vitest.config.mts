// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace package.
 * Scope: Discovers packages/<pkg>/tests/** and resolves @tickwork/* through tsconfig paths.
 * Invariants: No network or external processes in tests; coverage disabled by default.
 * Side-effects: none
 * @public
 */

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "html"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "**/tests/", "dist/", "**/index.ts"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
});
