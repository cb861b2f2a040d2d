// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/tests/fixtures`
 * Purpose: Reusable fixtures and in-process fakes for scheduler-core unit tests.
 * Scope: Containers, labels, a fake trigger scheduler and a fake container runtime. No Docker, no timers.
 * Invariants: Fakes honour the port contracts (conflict on duplicate id, idempotent unschedule, found/not-found lookup).
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import { vi } from "vitest";

import {
  type ContainerLookup,
  type ContainerRef,
  type ContainerRuntimePort,
  type ExecResult,
  InvalidCronExpressionError,
  type LifecycleEvent,
  type StreamEventsOptions,
  type TriggerCallback,
  TriggerConflictError,
  type TriggerSchedulerPort,
} from "../src/index.js";

export const FIXED_IDS = {
  /** Full 64-char id; short id is abcdef012345 */
  containerId: "abcdef0123456789abcdef0123456789abcdef0123456789abcdef0123456789",
  containerShortId: "abcdef012345",
  otherContainerId: "0123456789ab0000000000000000000000000000000000000000000000000000",
  otherContainerShortId: "0123456789ab",
} as const;

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createContainer(overrides?: {
  id?: string;
  name?: string;
  labels?: Record<string, string>;
}): ContainerRef {
  const id = overrides?.id ?? FIXED_IDS.containerId;
  return {
    id,
    shortId: id.slice(0, 12),
    name: overrides?.name ?? "c1",
    labels: overrides?.labels ?? {},
  };
}

/** Labels for the canonical backup job. */
export function backupLabels(overrides?: Record<string, string>) {
  return {
    "scheduler.enable": "true",
    "scheduler.backup.schedule": "0 2 * * *",
    "scheduler.backup.command": "tar czf /b.tgz /data",
    ...overrides,
  };
}

const CRON_FIELD = /^[\d*/,-]+$/;

/**
 * Trigger scheduler that never fires on its own; tests call fire(jobId).
 * Accepts exactly five fields of digits and cron punctuation.
 */
export class FakeTriggerScheduler implements TriggerSchedulerPort {
  readonly triggers = new Map<
    string,
    { expression: string; run: () => Promise<void> | void }
  >();
  started = false;
  stopped = false;

  validateCronExpression(expression: string): boolean {
    const fields = expression.trim().split(/\s+/);
    return fields.length === 5 && fields.every((f) => CRON_FIELD.test(f));
  }

  schedule<TArgs extends readonly unknown[]>(
    expression: string,
    jobId: string,
    callback: TriggerCallback<TArgs>,
    args: TArgs
  ): void {
    if (!this.validateCronExpression(expression)) {
      throw new InvalidCronExpressionError(expression, "rejected by fake");
    }
    if (this.triggers.has(jobId)) {
      throw new TriggerConflictError(jobId);
    }
    this.triggers.set(jobId, { expression, run: () => callback(...args) });
  }

  unschedule(jobId: string): boolean {
    return this.triggers.delete(jobId);
  }

  listScheduledIds(): string[] {
    return [...this.triggers.keys()];
  }

  start(): void {
    this.started = true;
  }

  shutdown(): void {
    this.stopped = true;
  }

  async fire(jobId: string): Promise<void> {
    const trigger = this.triggers.get(jobId);
    if (!trigger) throw new Error(`No trigger for ${jobId}`);
    await trigger.run();
  }
}

/**
 * Container runtime backed by in-memory containers and a scripted event list.
 */
export class FakeContainerRuntime implements ContainerRuntimePort {
  readonly containers = new Map<string, ContainerRef>();
  events: LifecycleEvent[] = [];
  readonly execCalls: Array<{ containerId: string; cmd: readonly string[] }> = [];
  execResult: ExecResult | Error = { exitCode: 0, output: "" };

  constructor(containers: ContainerRef[] = []) {
    for (const container of containers) this.put(container);
  }

  put(container: ContainerRef): void {
    this.containers.set(container.shortId, container);
  }

  async ping(): Promise<void> {}

  async listRunningContainers(): Promise<ContainerRef[]> {
    return [...this.containers.values()];
  }

  async getContainerByShortId(shortId: string): Promise<ContainerLookup> {
    const container = this.containers.get(shortId);
    return container ? { found: true, container } : { found: false };
  }

  async *streamEvents(options: StreamEventsOptions): AsyncIterable<LifecycleEvent> {
    for (const event of this.events) {
      if (options.signal.aborted) return;
      yield event;
    }
  }

  async execInContainer(
    containerId: string,
    cmd: readonly string[]
  ): Promise<ExecResult> {
    this.execCalls.push({ containerId, cmd });
    if (this.execResult instanceof Error) throw this.execResult;
    return this.execResult;
  }
}
