// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/ports/trigger-scheduler`
 * Purpose: Vendor-agnostic port for the cron trigger primitive.
 * Scope: Contract for validating cron expressions and firing callbacks at cron instants. Does not contain implementations.
 * Invariants:
 *   - At most one registered timer per job id; schedule throws TriggerConflictError on a taken id
 *   - unschedule is idempotent and cancels future fires only, never an in-flight callback
 *   - shutdown does not wait for in-flight callbacks
 * Side-effects: none (interface definition only)
 * Links: services/label-scheduler/src/adapters/cron/cron-trigger-scheduler.ts
 * @public
 */

/**
 * Port-level error thrown when a cron expression is rejected at registration.
 */
export class InvalidCronExpressionError extends Error {
  constructor(
    public readonly cron: string,
    public readonly reason: string
  ) {
    super(`Invalid cron expression "${cron}": ${reason}`);
    this.name = "InvalidCronExpressionError";
  }
}

/**
 * Port-level error thrown when a trigger is already registered under the id.
 */
export class TriggerConflictError extends Error {
  constructor(public readonly jobId: string) {
    super(`Trigger already registered: ${jobId}`);
    this.name = "TriggerConflictError";
  }
}

export function isInvalidCronExpressionError(
  error: unknown
): error is InvalidCronExpressionError {
  return error instanceof Error && error.name === "InvalidCronExpressionError";
}

export function isTriggerConflictError(
  error: unknown
): error is TriggerConflictError {
  return error instanceof Error && error.name === "TriggerConflictError";
}

export type TriggerCallback<TArgs extends readonly unknown[]> = (
  ...args: TArgs
) => Promise<void> | void;

export interface TriggerSchedulerPort {
  /** Pass/fail oracle for five-field cron syntax */
  validateCronExpression(expression: string): boolean;

  /**
   * Registers `callback(...args)` to fire at every instant matching `expression`.
   *
   * @throws InvalidCronExpressionError
   * @throws TriggerConflictError if jobId is already registered
   */
  schedule<TArgs extends readonly unknown[]>(
    expression: string,
    jobId: string,
    callback: TriggerCallback<TArgs>,
    args: TArgs
  ): void;

  /** @returns whether a trigger was registered under jobId */
  unschedule(jobId: string): boolean;

  listScheduledIds(): string[];

  /** Begins firing. Triggers registered earlier are armed now. */
  start(): void;

  /** Stops all future fires without waiting for running callbacks. */
  shutdown(): void;
}
