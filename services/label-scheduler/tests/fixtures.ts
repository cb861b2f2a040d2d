// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/tests/fixtures`
 * Purpose: Shared stubs for adapter tests (mock logger, dockerode client stand-in).
 * Scope: Test-only helpers. No sockets are opened.
 * @internal
 */

import type { LoggerLike } from "@labelcron/scheduler-core";
import type Docker from "dockerode";
import { vi } from "vitest";

export const FIXED_IDS = {
  containerId: "abcdef0123456789abcdef0123456789abcdef0123456789abcdef0123456789",
  shortId: "abcdef012345",
} as const;

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LoggerLike;
}

/** Only the dockerode surface the runtime adapter touches. */
export interface DockerStub {
  ping?: () => Promise<unknown>;
  listContainers?: () => Promise<unknown[]>;
  getEvents?: (opts: unknown) => Promise<NodeJS.ReadableStream>;
  getContainer?: (id: string) => unknown;
}

export function stubDocker(stub: DockerStub): Docker {
  return stub as unknown as Docker;
}
