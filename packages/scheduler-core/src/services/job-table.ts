// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/services/job-table`
 * Purpose: Live set of scheduled jobs keyed by job id, each backed by one trigger registration.
 * Scope: Owns JobRecord → trigger bookkeeping. Does not read labels or talk to the container runtime.
 * Invariants:
 * - An id is present in the table iff a trigger is registered for it by this table
 * - add never overwrites: a taken id throws DuplicateJobIdError
 * - removeByPrefix is idempotent; unknown prefixes are a no-op
 * - Every operation is synchronous, so it is atomic on the event loop relative to trigger fires and reconciliation
 * Side-effects: trigger (un)registration via TriggerSchedulerPort
 * Links: src/services/reconcile-container.ts, src/ports/trigger-scheduler.port.ts
 * @public
 */

import type { LoggerLike } from "../logger.js";
import type { TriggerSchedulerPort } from "../ports/index.js";
import type { JobRecord } from "../types.js";

/**
 * Structural error: the caller added a job without first clearing its container.
 * Aborts the current reconciliation.
 */
export class DuplicateJobIdError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job already present in table: ${jobId}`);
    this.name = "DuplicateJobIdError";
  }
}

export function isDuplicateJobIdError(
  error: unknown
): error is DuplicateJobIdError {
  return error instanceof Error && error.name === "DuplicateJobIdError";
}

export interface JobTableEntry {
  readonly record: JobRecord;
  readonly registeredAt: Date;
}

export type JobExecutor = (record: JobRecord) => Promise<void>;

export interface JobTableDeps {
  scheduler: TriggerSchedulerPort;
  /** Invoked by the trigger scheduler at fire time */
  execute: JobExecutor;
  log: LoggerLike;
}

export class JobTable {
  private readonly entries = new Map<string, JobTableEntry>();

  constructor(private readonly deps: JobTableDeps) {}

  get size(): number {
    return this.entries.size;
  }

  get(id: string): JobTableEntry | undefined {
    return this.entries.get(id);
  }

  /**
   * Registers a trigger for the record and tracks it.
   *
   * @throws DuplicateJobIdError if the id is already tracked
   * @throws InvalidCronExpressionError / TriggerConflictError from the scheduler
   */
  add(record: JobRecord): JobTableEntry {
    if (this.entries.has(record.id)) {
      throw new DuplicateJobIdError(record.id);
    }

    this.deps.scheduler.schedule(
      record.schedule,
      record.id,
      this.deps.execute,
      [record]
    );

    const entry: JobTableEntry = { record, registeredAt: new Date() };
    this.entries.set(record.id, entry);
    this.deps.log.info(
      {
        jobId: record.id,
        containerName: record.containerName,
        schedule: record.schedule,
        command: record.command,
      },
      "Scheduled job"
    );
    return entry;
  }

  /**
   * Unregisters and drops every job whose id starts with `prefix`.
   * @returns the removed ids
   */
  removeByPrefix(prefix: string): string[] {
    const removed: string[] = [];

    for (const id of [...this.entries.keys()]) {
      if (!id.startsWith(prefix)) continue;
      this.deps.scheduler.unschedule(id);
      this.entries.delete(id);
      removed.push(id);
      this.deps.log.info({ jobId: id }, "Removed job");
    }

    return removed;
  }

  listIds(): string[] {
    return [...this.entries.keys()];
  }
}
