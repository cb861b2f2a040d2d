// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/labels/validate-jobs`
 * Purpose: Turns raw label groups into JobRecords, dropping incomplete or unschedulable ones.
 * Scope: Completeness + cron syntax checks. Cron grammar is delegated to the trigger scheduler's oracle.
 * Invariants:
 * - Never throws; every rejection is a warn log + skip
 * - Every returned record passed isValidCron(record.schedule)
 * - Output order follows job-name iteration and must not be relied on
 * Side-effects: logging only
 * Links: src/labels/extract-raw-jobs.ts, src/ports/trigger-scheduler.port.ts
 * @public
 */

import type { LoggerLike } from "../logger.js";
import type { ContainerRef, JobRecord, RawJobGroup } from "../types.js";

export function jobIdFor(containerShortId: string, jobName: string): string {
  return `${containerShortId}_${jobName}`;
}

export function validateJobs(
  container: Pick<ContainerRef, "shortId" | "name">,
  rawJobs: RawJobGroup,
  isValidCron: (expression: string) => boolean,
  log: LoggerLike
): JobRecord[] {
  const jobs: JobRecord[] = [];

  for (const [jobName, props] of Object.entries(rawJobs)) {
    const { schedule, command } = props;
    const context = {
      containerId: container.shortId,
      containerName: container.name,
      jobName,
    };

    if (!schedule || !command) {
      log.warn(
        { ...context, hasSchedule: !!schedule, hasCommand: !!command },
        "Incomplete job definition: missing schedule or command"
      );
      continue;
    }

    if (!isValidCron(schedule)) {
      log.warn(
        { ...context, schedule },
        "Invalid schedule (not a five-field cron expression)"
      );
      continue;
    }

    jobs.push({
      id: jobIdFor(container.shortId, jobName),
      jobName,
      containerShortId: container.shortId,
      containerName: container.name,
      schedule,
      command,
    });
  }

  return jobs;
}
