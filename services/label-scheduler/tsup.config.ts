// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/tsup.config`
 * Purpose: Build configuration for the deployable label-scheduler service.
 * Scope: Defines tsup bundler settings. Does not contain runtime code.
 * Invariants: ESM only. The scheduler-core workspace (TypeScript sources) is bundled in; npm deps stay external.
 * Side-effects: none
 * Links: services/label-scheduler/Dockerfile
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: ["@labelcron/scheduler-core"],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});
