// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/services/reconcile-container`
 * Purpose: Brings one container's jobs in the Job Table in line with its current labels.
 * Scope: Remove-then-rebuild for a single container. Does not fetch containers or react to events.
 * Invariants:
 * - REMOVE_FIRST: every job under `${shortId}_` is removed before anything else, enabled or not
 * - ENABLE_GATE: a container without scheduler.enable=true ends with zero jobs
 * - After return, the table ids under the prefix equal the valid job names in the labels
 * - DuplicateJobIdError / InvalidCronExpressionError from add propagate and abort this call only
 * Side-effects: Job Table mutations (trigger registration)
 * Links: src/services/job-table.ts, src/labels/
 * @public
 */

import { isSchedulerEnabled } from "../labels/enablement.js";
import { extractRawJobs } from "../labels/extract-raw-jobs.js";
import { validateJobs } from "../labels/validate-jobs.js";
import type { LoggerLike } from "../logger.js";
import type { TriggerSchedulerPort } from "../ports/index.js";
import type { ContainerRef, JobRecord } from "../types.js";
import type { JobTable } from "./job-table.js";

export interface ReconcileDeps {
  table: JobTable;
  scheduler: Pick<TriggerSchedulerPort, "validateCronExpression">;
  log: LoggerLike;
}

export function containerJobPrefix(containerShortId: string): string {
  return `${containerShortId}_`;
}

/**
 * @returns the records scheduled for the container (empty when disabled)
 */
export function reconcileContainer(
  container: ContainerRef,
  deps: ReconcileDeps
): JobRecord[] {
  const { table, scheduler, log } = deps;

  table.removeByPrefix(containerJobPrefix(container.shortId));

  if (!isSchedulerEnabled(container.labels)) {
    return [];
  }

  const rawJobs = extractRawJobs(container.labels);
  const jobs = validateJobs(
    container,
    rawJobs,
    (expression) => scheduler.validateCronExpression(expression),
    log
  );

  log.info(
    {
      containerId: container.shortId,
      containerName: container.name,
      jobCount: jobs.length,
    },
    "Resyncing jobs for container"
  );

  for (const job of jobs) {
    table.add(job);
  }

  return jobs;
}
