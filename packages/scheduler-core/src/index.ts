// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core`
 * Purpose: Reconciliation and execution engine for label-driven container jobs.
 * Scope: Ports, label parsing, Job Table, reconcile/event/exec services. Does not contain adapters or vendor imports.
 * Invariants:
 * - FORBIDDEN: dockerode, cron-parser, pino, node:* I/O
 * - ALLOWED: port interfaces, pure logic, injected deps
 * Side-effects: none
 * @public
 */

// Label parsing
export { isSchedulerEnabled } from "./labels/enablement.js";
export { extractRawJobs } from "./labels/extract-raw-jobs.js";
export { jobIdFor, validateJobs } from "./labels/validate-jobs.js";
export type { LoggerLike } from "./logger.js";
// Ports
export {
  ContainerRuntimeUnavailableError,
  type ContainerRuntimePort,
  InvalidCronExpressionError,
  isContainerRuntimeUnavailableError,
  isInvalidCronExpressionError,
  isTriggerConflictError,
  type StreamEventsOptions,
  type TriggerCallback,
  TriggerConflictError,
  type TriggerSchedulerPort,
} from "./ports/index.js";
// Services
export {
  type EventEffect,
  type EventLoopDeps,
  handleLifecycleEvent,
  REMOVE_ACTIONS,
  type RunEventLoopDeps,
  runEventLoop,
  SYNC_ACTIONS,
} from "./services/event-loop.js";
export {
  createJobExecutor,
  type ExecuteJobDeps,
  SHELL,
  shellCommand,
} from "./services/execute-job.js";
export {
  type InitialSyncDeps,
  type InitialSyncResult,
  initialSync,
} from "./services/initial-sync.js";
export {
  DuplicateJobIdError,
  isDuplicateJobIdError,
  type JobExecutor,
  JobTable,
  type JobTableDeps,
  type JobTableEntry,
} from "./services/job-table.js";
export {
  containerJobPrefix,
  type ReconcileDeps,
  reconcileContainer,
} from "./services/reconcile-container.js";
// Types
export {
  type ContainerLookup,
  type ContainerRef,
  ENABLE_LABEL,
  type ExecResult,
  JOB_LABEL_PROPS,
  type JobLabelProp,
  type JobRecord,
  LABEL_NAMESPACE,
  type LifecycleEvent,
  type RawJobGroup,
  SHORT_ID_LENGTH,
} from "./types.js";
