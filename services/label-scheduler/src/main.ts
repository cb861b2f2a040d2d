// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/main`
 * Purpose: Service entry point: preflight, initial sync, event loop, graceful shutdown.
 * Scope: Entry point that calls env() and wires the container. Does not contain reconciliation logic.
 * Invariants:
 *   - Refuses to start without a reachable runtime socket (exit 1)
 *   - Initial sync completes before the event loop starts consuming
 *   - SIGTERM/SIGINT: stop intake, stop future fires without waiting for running jobs, exit 0
 *   - The event stream ending or failing outside shutdown is fatal (exit 1); restart means full rediscovery
 * Side-effects: IO (Docker socket, health port, process signals)
 * Links: bootstrap/container.ts, packages/scheduler-core/src/services/
 * @public
 */

import { existsSync } from "node:fs";

import {
  ContainerRuntimeUnavailableError,
  initialSync,
  runEventLoop,
} from "@labelcron/scheduler-core";

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { type HealthState, startHealthServer } from "./health.js";
import { createShutdown, installSignalHandlers } from "./lifecycle.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Load and validate env
  const config = env();

  // Create logger (composition root owns logger creation)
  const logger = makeLogger();
  logger.info(
    { timezone: config.TZ, logLevel: config.LOG_LEVEL },
    "Configured timezone for job scheduling"
  );

  if (!existsSync(config.DOCKER_SOCKET_PATH)) {
    throw new ContainerRuntimeUnavailableError(
      config.DOCKER_SOCKET_PATH,
      new Error("socket not found")
    );
  }

  const container = createContainer(config, logger);
  const { runtime, scheduler, table } = container;
  await runtime.ping();
  logger.info({ socketPath: config.DOCKER_SOCKET_PATH }, "Connected to Docker");

  const healthState: HealthState = { ready: false };
  const server = startHealthServer(healthState, config.HEALTH_PORT, {
    listJobIds: () => table.listIds(),
  });
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  const events = new AbortController();
  const lifecycle = createShutdown({
    health: healthState,
    events,
    scheduler,
    server,
    jobCount: () => table.size,
    log: logger,
    flush: flushLogger,
    exit: (code) => process.exit(code),
  });
  installSignalHandlers(lifecycle);

  const fail = (msg: string, err?: unknown): void => {
    healthState.ready = false;
    logger.fatal({ err }, msg);
    scheduler.shutdown();
    flushLogger();
    process.exit(1);
  };

  scheduler.start();

  const reconcileDeps = {
    runtime,
    table,
    scheduler,
    log: logger.child({ component: "reconciler" }),
  };
  await initialSync(reconcileDeps);
  if (lifecycle.isShuttingDown()) return;

  void runEventLoop({
    ...reconcileDeps,
    log: logger.child({ component: "event-loop" }),
    signal: events.signal,
  }).then(
    () => {
      if (!lifecycle.isShuttingDown()) {
        fail("Docker event stream ended unexpectedly");
      }
    },
    (err: unknown) => {
      if (!lifecycle.isShuttingDown()) fail("Docker event stream failed", err);
    }
  );

  healthState.ready = true;
  logger.info({ jobs: table.size }, "Scheduler service is running");
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
