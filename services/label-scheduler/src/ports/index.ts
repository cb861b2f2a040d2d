// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/ports`
 * Purpose: Port barrel, the canonical import surface for all port interfaces used by this service.
 * Scope: Re-exports only. No implementations, no runtime objects.
 * Invariants: Named exports only, no concrete adapter types
 * Side-effects: none
 * Links: Consumed by bootstrap/ and adapters/
 * @public
 */

export type {
  ContainerRuntimePort,
  TriggerSchedulerPort,
} from "@labelcron/scheduler-core";
