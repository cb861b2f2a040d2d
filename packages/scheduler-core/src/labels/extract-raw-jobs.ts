// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/labels/extract-raw-jobs`
 * Purpose: Groups `scheduler.<job>.<prop>` labels into raw per-job property sets.
 * Scope: Pure parsing of label keys. Does not check completeness or cron syntax (see validate-jobs).
 * Invariants:
 * - Only keys with exactly three dot-separated segments, first segment `scheduler`, are considered
 * - Only `schedule` and `command` props are kept; `scheduler.enable` never yields a group
 * - Duplicate (job, prop) pairs: last one processed wins
 * Side-effects: none
 * Links: src/labels/validate-jobs.ts
 * @public
 */

import {
  JOB_LABEL_PROPS,
  type JobLabelProp,
  LABEL_NAMESPACE,
  type RawJobGroup,
} from "../types.js";

function isJobLabelProp(prop: string): prop is JobLabelProp {
  return (JOB_LABEL_PROPS as readonly string[]).includes(prop);
}

export function extractRawJobs(
  labels: Readonly<Record<string, string>>
): RawJobGroup {
  const groups: RawJobGroup = {};

  for (const [key, value] of Object.entries(labels)) {
    const parts = key.split(".");
    if (parts.length !== 3) continue;

    const [namespace, jobName, prop] = parts;
    if (namespace !== LABEL_NAMESPACE || !jobName || !prop) continue;
    if (!isJobLabelProp(prop)) continue;

    const group = groups[jobName] ?? {};
    group[prop] = value;
    groups[jobName] = group;
  }

  return groups;
}
