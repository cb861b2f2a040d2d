// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/labels/enablement`
 * Purpose: Reads the `scheduler.enable` opt-in flag.
 * Invariants: Enabled only when the value, lowercased, is exactly "true". No trimming.
 * Side-effects: none
 * @public
 */

import { ENABLE_LABEL } from "../types.js";

export function isSchedulerEnabled(
  labels: Readonly<Record<string, string>>
): boolean {
  return (labels[ENABLE_LABEL] ?? "").toLowerCase() === "true";
}
