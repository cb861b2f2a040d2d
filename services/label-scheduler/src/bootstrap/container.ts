// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/bootstrap/container`
 * Purpose: Composition root. Wires concrete adapters to port interfaces and owns the Job Table.
 * Scope: All adapter construction lives here. Returns a typed container; starts nothing.
 * Invariants:
 * - Only file that imports concrete adapters (dockerode runtime, cron trigger scheduler)
 * - Exactly one JobTable per process; passed by reference, never a module global
 * - The executor, table and event loop share the same runtime and scheduler instances
 * Side-effects: none (the Docker client connects lazily on first call)
 * Links: src/ports/index.ts, main.ts
 * @internal
 */

import { createJobExecutor, JobTable } from "@labelcron/scheduler-core";
import type Docker from "dockerode";

import { CronTriggerScheduler } from "../adapters/cron/cron-trigger-scheduler.js";
import { DockerContainerRuntime } from "../adapters/docker/docker-runtime.adapter.js";
import type { Logger } from "../observability/logger.js";
import type { ContainerRuntimePort, TriggerSchedulerPort } from "../ports/index.js";
import type { Env } from "./env.js";

/**
 * Service container; deps typed against port interfaces.
 */
export interface ServiceContainer {
  runtime: ContainerRuntimePort;
  scheduler: TriggerSchedulerPort;
  table: JobTable;
  config: {
    socketPath: string;
    timezone: string;
  };
  logger: Logger;
}

/**
 * Build the service container from validated env and logger.
 * `docker` overrides the client (tests).
 */
export function createContainer(
  config: Env,
  logger: Logger,
  docker?: Docker
): ServiceContainer {
  const runtime = new DockerContainerRuntime({
    socketPath: config.DOCKER_SOCKET_PATH,
    logger,
    docker,
  });

  const scheduler = new CronTriggerScheduler({
    timezone: config.TZ,
    logger: logger.child({ component: "trigger-scheduler" }),
  });

  const execute = createJobExecutor({
    runtime,
    log: logger.child({ component: "executor" }),
  });

  const table = new JobTable({
    scheduler,
    execute,
    log: logger.child({ component: "job-table" }),
  });

  return {
    runtime,
    scheduler,
    table,
    config: {
      socketPath: config.DOCKER_SOCKET_PATH,
      timezone: config.TZ,
    },
    logger,
  };
}
