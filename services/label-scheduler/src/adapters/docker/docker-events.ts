// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/adapters/docker/docker-events`
 * Purpose: Zod schema and mapping for Docker engine event lines.
 * Scope: Parses one JSON line from /events into a LifecycleEvent. Does not open streams.
 * Invariants:
 * - Non-container events and unparseable lines map to null, never throw
 * - containerId prefers Actor.ID, falling back to the legacy top-level id
 * Side-effects: none
 * Links: adapters/docker/docker-runtime.adapter.ts
 * @internal
 */

import type { LifecycleEvent } from "@labelcron/scheduler-core";
import { z } from "zod";

const DockerEventSchema = z.object({
  Type: z.string().optional(),
  Action: z.string().min(1),
  id: z.string().optional(),
  Actor: z
    .object({
      ID: z.string().optional(),
      Attributes: z.record(z.string()).optional(),
    })
    .optional(),
});

export function parseDockerEventLine(line: string): LifecycleEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const parsed = DockerEventSchema.safeParse(json);
  if (!parsed.success) return null;

  const event = parsed.data;
  if (event.Type !== undefined && event.Type !== "container") return null;

  const containerId = event.Actor?.ID ?? event.id;
  if (!containerId) return null;

  const containerName = event.Actor?.Attributes?.name;
  return containerName
    ? { action: event.Action, containerId, containerName }
    : { action: event.Action, containerId };
}
