// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest runner configuration for pure unit tests and jsdom component tests.
 * Scope: Configures test discovery, jsdom environment and path aliases. Does not bundle the library.
 * Invariants: No network; timers are faked per-test where needed; @/ and @tests/ resolve like tsconfig paths.
 * Side-effects: none
 * Notes: JSX is compiled by esbuild with the automatic runtime, matching tsconfig "react-jsx".
 * Links: tests/setup.ts, tsconfig.json
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "jsdom",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.{test,spec}.{ts,tsx}"],
    exclude: ["node_modules", "dist"],
    restoreMocks: true,
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
});
