// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/lifecycle`
 * Purpose: Graceful shutdown on SIGTERM/SIGINT.
 * Scope: Stops event intake and future fires, closes the health server, flushes logs, exits. Does not wait for running jobs.
 * Invariants:
 * - Installed before the scheduler starts, so a signal during initial sync takes the same path
 * - Runs once; repeated signals only warn
 * Side-effects: process signal listeners, process exit (both injectable)
 * Links: main.ts
 * @internal
 */

import type { LoggerLike, TriggerSchedulerPort } from "@labelcron/scheduler-core";

import type { HealthState } from "./health.js";

export const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

export interface ShutdownDeps {
  health: HealthState;
  /** Aborts the Docker event stream */
  events: AbortController;
  scheduler: Pick<TriggerSchedulerPort, "shutdown">;
  server: { close(): unknown };
  jobCount: () => number;
  log: Pick<LoggerLike, "info" | "warn">;
  flush: () => void;
  exit: (code: number) => void;
}

export interface ShutdownController {
  shutdown(signal: string): void;
  isShuttingDown(): boolean;
}

export function createShutdown(deps: ShutdownDeps): ShutdownController {
  let shuttingDown = false;

  return {
    isShuttingDown: () => shuttingDown,
    shutdown(signal) {
      if (shuttingDown) {
        deps.log.warn({ signal }, "Shutdown already in progress");
        return;
      }
      shuttingDown = true;
      deps.health.ready = false; // Stop accepting new work
      deps.log.info({ signal }, "Received signal, shutting down");

      deps.events.abort();
      deps.scheduler.shutdown();
      deps.server.close();
      deps.log.info({ jobs: deps.jobCount() }, "Scheduler stopped");
      deps.flush();
      deps.exit(0);
    },
  };
}

export function installSignalHandlers(
  controller: ShutdownController,
  target: { on(event: string, listener: () => void): unknown } = process
): void {
  for (const signal of SHUTDOWN_SIGNALS) {
    target.on(signal, () => controller.shutdown(signal));
  }
}
