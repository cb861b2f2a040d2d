// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/adapters/cron/cron-trigger-scheduler`
 * Purpose: In-process TriggerSchedulerPort: cron-parser computes fire instants, one timer per job id fires them.
 * Scope: Registration, arming, firing and overlap control. Does not know what a job does.
 * Invariants:
 *   - FIVE_FIELDS: only standard five-field expressions are accepted
 *   - ONE_TIMER_PER_ID: a job id has at most one pending timer; schedule on a taken id throws TriggerConflictError
 *   - NO_OVERLAP: a fire is skipped (warn) while the previous run of the same job id is still in flight,
 *     including a run started by a trigger that was since unscheduled and registered again
 *   - The next fire is armed before the callback runs, so a slow job never shifts its own schedule
 *   - Callback errors are logged, never rethrown; unschedule/shutdown never wait for a running callback
 * Side-effects: timers
 * Links: packages/scheduler-core/src/ports/trigger-scheduler.port.ts
 * @internal
 */

import {
  InvalidCronExpressionError,
  type LoggerLike,
  type TriggerCallback,
  TriggerConflictError,
  type TriggerSchedulerPort,
} from "@labelcron/scheduler-core";
import cronParser from "cron-parser";

/** setTimeout clamps larger delays to 1ms; longer waits are chained. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Five-field crons never fire twice within a minute; stepping past the fire second avoids re-matching it. */
const REARM_OFFSET_MS = 1_000;

interface Trigger {
  readonly jobId: string;
  readonly expression: string;
  readonly invoke: () => Promise<void> | void;
  timer: NodeJS.Timeout | null;
  nextRunAt: Date | null;
}

export interface CronTriggerSchedulerConfig {
  /** IANA timezone expressions are evaluated in */
  timezone: string;
  logger: LoggerLike;
  /** Injectable clock (defaults to the system clock) */
  now?: () => Date;
}

export class CronTriggerScheduler implements TriggerSchedulerPort {
  private readonly triggers = new Map<string, Trigger>();
  /** Job ids with a callback in flight; outlives the Trigger that started it */
  private readonly inFlight = new Set<string>();
  private readonly timezone: string;
  private readonly log: LoggerLike;
  private readonly now: () => Date;
  private started = false;

  constructor(config: CronTriggerSchedulerConfig) {
    this.timezone = config.timezone;
    this.log = config.logger;
    this.now = config.now ?? (() => new Date());
  }

  validateCronExpression(expression: string): boolean {
    return this.checkExpression(expression) === null;
  }

  schedule<TArgs extends readonly unknown[]>(
    expression: string,
    jobId: string,
    callback: TriggerCallback<TArgs>,
    args: TArgs
  ): void {
    const problem = this.checkExpression(expression);
    if (problem !== null) {
      throw new InvalidCronExpressionError(expression, problem);
    }
    if (this.triggers.has(jobId)) {
      throw new TriggerConflictError(jobId);
    }

    const trigger: Trigger = {
      jobId,
      expression,
      invoke: () => callback(...args),
      timer: null,
      nextRunAt: null,
    };
    this.triggers.set(jobId, trigger);

    if (this.started) {
      this.arm(trigger, this.now());
    }
  }

  unschedule(jobId: string): boolean {
    const trigger = this.triggers.get(jobId);
    if (!trigger) return false;

    this.disarm(trigger);
    this.triggers.delete(jobId);
    return true;
  }

  listScheduledIds(): string[] {
    return [...this.triggers.keys()];
  }

  /** Next pending fire for a job, or null if unknown or not armed. */
  nextRunAt(jobId: string): Date | null {
    return this.triggers.get(jobId)?.nextRunAt ?? null;
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    const now = this.now();
    for (const trigger of this.triggers.values()) {
      this.arm(trigger, now);
    }
    this.log.info(
      { timezone: this.timezone, triggers: this.triggers.size },
      "Trigger scheduler started"
    );
  }

  shutdown(): void {
    this.started = false;
    for (const trigger of this.triggers.values()) {
      this.disarm(trigger);
    }
    this.log.info({ triggers: this.triggers.size }, "Trigger scheduler stopped");
  }

  /** @returns null when valid, otherwise the reason */
  private checkExpression(expression: string): string | null {
    const fields = expression.trim().split(/\s+/);
    if (fields.length !== 5) {
      return `expected 5 fields, got ${fields.length}`;
    }
    try {
      cronParser.parseExpression(expression, { tz: this.timezone });
      return null;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  private arm(trigger: Trigger, after: Date): void {
    const interval = cronParser.parseExpression(trigger.expression, {
      currentDate: after,
      tz: this.timezone,
    });
    const fireAt = interval.next().toDate();
    trigger.nextRunAt = fireAt;
    this.setTimer(trigger, fireAt);
  }

  private setTimer(trigger: Trigger, fireAt: Date): void {
    const delay = Math.max(0, fireAt.getTime() - this.now().getTime());

    if (delay > MAX_TIMER_DELAY_MS) {
      trigger.timer = setTimeout(
        () => this.setTimer(trigger, fireAt),
        MAX_TIMER_DELAY_MS
      );
      return;
    }
    trigger.timer = setTimeout(() => this.fire(trigger, fireAt), delay);
  }

  private disarm(trigger: Trigger): void {
    if (trigger.timer) {
      clearTimeout(trigger.timer);
      trigger.timer = null;
    }
    trigger.nextRunAt = null;
  }

  private fire(trigger: Trigger, firedAt: Date): void {
    trigger.timer = null;
    if (!this.started || this.triggers.get(trigger.jobId) !== trigger) return;

    this.arm(trigger, new Date(firedAt.getTime() + REARM_OFFSET_MS));

    if (this.inFlight.has(trigger.jobId)) {
      this.log.warn(
        { jobId: trigger.jobId, scheduledFor: firedAt.toISOString() },
        "Skipping fire: previous run still in progress"
      );
      return;
    }

    this.inFlight.add(trigger.jobId);
    void this.run(trigger)
      .catch((err) => {
        this.log.error(
          {
            jobId: trigger.jobId,
            err: err instanceof Error ? err.message : String(err),
          },
          "Trigger callback failed"
        );
      })
      .finally(() => {
        this.inFlight.delete(trigger.jobId);
      });
  }

  private async run(trigger: Trigger): Promise<void> {
    await trigger.invoke();
  }
}
