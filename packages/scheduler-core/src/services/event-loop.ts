// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/services/event-loop`
 * Purpose: Applies container lifecycle events to the Job Table, one at a time, in delivery order.
 * Scope: Event classification and dispatch to reconcile/removal. Does not own the stream's transport.
 * Invariants:
 * - SEQUENTIAL: each event is fully handled before the next is read; no reordering
 * - SYNC actions (start, update, unpause) resolve the container and reconcile it; a vanished container is a no-op
 * - REMOVE actions (stop, die, destroy, pause) never look the container up
 * - handleLifecycleEvent never throws; structural errors are logged and the loop continues
 * Side-effects: IO (container lookup), Job Table mutations
 * Links: src/services/reconcile-container.ts, src/ports/container-runtime.port.ts
 * @public
 */

import type { LoggerLike } from "../logger.js";
import type { ContainerRuntimePort } from "../ports/index.js";
import {
  type ContainerLookup,
  type LifecycleEvent,
  SHORT_ID_LENGTH,
} from "../types.js";
import {
  containerJobPrefix,
  type ReconcileDeps,
  reconcileContainer,
} from "./reconcile-container.js";

export const SYNC_ACTIONS = ["start", "update", "unpause"] as const;
export const REMOVE_ACTIONS = ["stop", "die", "destroy", "pause"] as const;

export type EventEffect = "reconciled" | "removed" | "skipped" | "ignored" | "failed";

export interface EventLoopDeps extends ReconcileDeps {
  runtime: Pick<ContainerRuntimePort, "getContainerByShortId" | "streamEvents">;
}

function isOneOf<T extends string>(values: readonly T[], action: string): action is T {
  return (values as readonly string[]).includes(action);
}

/**
 * Handles a single event. Resolves to what happened, for tests and diagnostics.
 */
export async function handleLifecycleEvent(
  event: LifecycleEvent,
  deps: EventLoopDeps
): Promise<EventEffect> {
  const { runtime, table, log } = deps;
  const { action } = event;
  const shortId = event.containerId.slice(0, SHORT_ID_LENGTH);
  const context = {
    action,
    containerId: shortId,
    containerName: event.containerName ?? shortId,
  };

  if (isOneOf(SYNC_ACTIONS, action)) {
    let lookup: ContainerLookup;
    try {
      lookup = await runtime.getContainerByShortId(shortId);
    } catch (err) {
      log.warn(
        { ...context, err: err instanceof Error ? err.message : String(err) },
        "Container lookup failed, skipping sync"
      );
      return "skipped";
    }

    if (!lookup.found) {
      log.info(context, "Container gone before sync, skipping");
      return "skipped";
    }

    log.info(
      { ...context, containerName: lookup.container.name },
      "Syncing jobs due to container event"
    );
    try {
      reconcileContainer(lookup.container, deps);
      return "reconciled";
    } catch (err) {
      log.error(
        { ...context, err: err instanceof Error ? err.message : String(err) },
        "Reconciliation aborted"
      );
      return "failed";
    }
  }

  if (isOneOf(REMOVE_ACTIONS, action)) {
    log.info(context, "Removing jobs due to container event");
    table.removeByPrefix(containerJobPrefix(shortId));
    return "removed";
  }

  log.debug(context, "Ignoring container event");
  return "ignored";
}

export interface RunEventLoopDeps extends EventLoopDeps {
  signal: AbortSignal;
}

/**
 * Drains the runtime's event stream until it ends or `signal` aborts.
 * Stream transport failures propagate to the caller.
 *
 * @returns the number of events handled
 */
export async function runEventLoop(deps: RunEventLoopDeps): Promise<number> {
  const { runtime, signal, log } = deps;
  let handled = 0;

  log.info({}, "Event loop started");
  for await (const event of runtime.streamEvents({ signal })) {
    if (signal.aborted) break;
    await handleLifecycleEvent(event, deps);
    handled++;
  }
  log.info({ handled }, "Event loop stopped");

  return handled;
}
