// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/services/initial-sync`
 * Purpose: Full-fleet rediscovery at startup: reconcile every running container once.
 * Scope: Runs before the event loop consumes. Does not retain any state of its own.
 * Invariants: A failed reconciliation of one container is logged and never blocks the rest.
 * Side-effects: IO (container listing), Job Table mutations
 * @public
 */

import type { ContainerRuntimePort } from "../ports/index.js";
import { type ReconcileDeps, reconcileContainer } from "./reconcile-container.js";

export interface InitialSyncDeps extends ReconcileDeps {
  runtime: Pick<ContainerRuntimePort, "listRunningContainers">;
}

export interface InitialSyncResult {
  containers: number;
  jobs: number;
  failed: string[];
}

export async function initialSync(deps: InitialSyncDeps): Promise<InitialSyncResult> {
  const { runtime, log } = deps;
  log.info({}, "Performing initial sync");

  const containers = await runtime.listRunningContainers();
  const result: InitialSyncResult = { containers: containers.length, jobs: 0, failed: [] };

  for (const container of containers) {
    try {
      result.jobs += reconcileContainer(container, deps).length;
    } catch (err) {
      result.failed.push(container.shortId);
      log.error(
        {
          containerId: container.shortId,
          containerName: container.name,
          err: err instanceof Error ? err.message : String(err),
        },
        "Reconciliation aborted during initial sync"
      );
    }
  }

  log.info({ ...result }, "Initial sync complete");
  return result;
}
