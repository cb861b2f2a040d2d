// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/types`
 * Purpose: Shared type definitions and label constants for label-driven scheduling (logic-free).
 * Scope: Defines ContainerRef, RawJobGroup, JobRecord, LifecycleEvent and lookup/exec results. Does not contain logic.
 * Invariants:
 * - ONLY exports: constants (as const), literal union types, and interfaces
 * - JobRecord.id is always `${containerShortId}_${jobName}`
 * Side-effects: none (constants and types only)
 * Links: src/labels/, src/services/
 * @public
 */

/** Label namespace every job key lives under. */
export const LABEL_NAMESPACE = "scheduler";

/** Label that opts a container into scheduling. */
export const ENABLE_LABEL = "scheduler.enable";

/** Properties recognised under `scheduler.<job>.<prop>`. */
export const JOB_LABEL_PROPS = ["schedule", "command"] as const;

export type JobLabelProp = (typeof JOB_LABEL_PROPS)[number];

/** Length of the container id prefix used as the table-facing identifier. */
export const SHORT_ID_LENGTH = 12;

/**
 * Container as seen by the core. Owned by the runtime; never mutated here.
 */
export interface ContainerRef {
  readonly id: string;
  /** First 12 characters of id */
  readonly shortId: string;
  readonly name: string;
  readonly labels: Readonly<Record<string, string>>;
}

/**
 * Job-name → partially specified job, straight from labels.
 * Produced and consumed within a single reconciliation.
 */
export type RawJobGroup = Record<string, { schedule?: string; command?: string }>;

/**
 * A validated, schedulable job. Immutable: a relabel produces a new record
 * with the same id that replaces the old one.
 */
export interface JobRecord {
  /** `${containerShortId}_${jobName}` */
  readonly id: string;
  readonly jobName: string;
  readonly containerShortId: string;
  readonly containerName: string;
  /** Five-field cron expression */
  readonly schedule: string;
  /** Shell command run via /bin/sh -c */
  readonly command: string;
}

/**
 * Container lifecycle event in runtime delivery order.
 * containerName comes from the event's own attributes when the runtime sends it.
 */
export interface LifecycleEvent {
  readonly action: string;
  readonly containerId: string;
  readonly containerName?: string;
}

/** Result of resolving a container by short id. Absence is a routine outcome, not an error. */
export type ContainerLookup =
  | { readonly found: true; readonly container: ContainerRef }
  | { readonly found: false };

/** Outcome of running a command inside a container. */
export interface ExecResult {
  readonly exitCode: number;
  /** Combined stdout/stderr */
  readonly output: string;
}
