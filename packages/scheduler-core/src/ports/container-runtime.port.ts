// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/ports/container-runtime`
 * Purpose: Vendor-agnostic port for the container runtime (list, lookup, lifecycle events, exec).
 * Scope: Defines the contract the core needs from the runtime. Does not contain implementations or vendor imports.
 * Invariants:
 *   - getContainerByShortId never throws for a missing container; returns { found: false }
 *   - streamEvents yields container events only, in runtime delivery order
 *   - streamEvents completes (does not throw) when the passed signal aborts
 *   - execInContainer resolves with any exit code; rejects only on transport failure
 * Side-effects: none (interface definition only)
 * Links: services/label-scheduler/src/adapters/docker/docker-runtime.adapter.ts
 * @public
 */

import type {
  ContainerLookup,
  ContainerRef,
  ExecResult,
  LifecycleEvent,
} from "../types.js";

/**
 * Error thrown when the runtime cannot be reached at all.
 * Fatal at startup: the scheduler refuses to run without a fleet view.
 */
export class ContainerRuntimeUnavailableError extends Error {
  constructor(
    public readonly endpoint: string,
    public override readonly cause?: Error
  ) {
    super(
      `Container runtime unavailable at ${endpoint}: ${cause?.message ?? "unknown error"}`
    );
    this.name = "ContainerRuntimeUnavailableError";
  }
}

export function isContainerRuntimeUnavailableError(
  error: unknown
): error is ContainerRuntimeUnavailableError {
  return (
    error instanceof Error && error.name === "ContainerRuntimeUnavailableError"
  );
}

export interface StreamEventsOptions {
  /** Aborting ends the stream */
  readonly signal: AbortSignal;
}

export interface ContainerRuntimePort {
  /**
   * Verifies the runtime answers.
   * @throws ContainerRuntimeUnavailableError
   */
  ping(): Promise<void>;

  listRunningContainers(): Promise<ContainerRef[]>;

  getContainerByShortId(shortId: string): Promise<ContainerLookup>;

  streamEvents(options: StreamEventsOptions): AsyncIterable<LifecycleEvent>;

  /**
   * Runs `cmd` (argv form) inside the container and waits for it to exit.
   */
  execInContainer(containerId: string, cmd: readonly string[]): Promise<ExecResult>;
}
