// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/ports`
 * Purpose: Ports barrel export.
 * Scope: Re-exports port interfaces and errors. Does not contain implementations.
 * Invariants: All exports are interfaces or error classes only.
 * Side-effects: none
 * @public
 */

export {
  ContainerRuntimeUnavailableError,
  type ContainerRuntimePort,
  isContainerRuntimeUnavailableError,
  type StreamEventsOptions,
} from "./container-runtime.port.js";
export {
  InvalidCronExpressionError,
  isInvalidCronExpressionError,
  isTriggerConflictError,
  type TriggerCallback,
  TriggerConflictError,
  type TriggerSchedulerPort,
} from "./trigger-scheduler.port.js";
