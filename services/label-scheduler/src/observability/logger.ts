// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers and flush them before exit.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads LOG_LEVEL, SERVICE_NAME and NODE_ENV directly so the boot logger works before env() has run.
 * Notes: Use makeLogger for the service; makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Links: observability/redact.ts, main.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

const destination = pino.destination({
  dest: 1,
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  sync: process.env.NODE_ENV !== "production",
  minLength: 4096,
});

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const nodeEnv = process.env.NODE_ENV ?? "development";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const level = process.env.LOG_LEVEL ?? "info";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const serviceName = process.env.SERVICE_NAME ?? "label-scheduler";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  return pino(
    {
      level,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, app: "labelcron", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    destination
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Drains buffered output; call right before process.exit. */
export function flushLogger(): void {
  destination.flushSync();
}
