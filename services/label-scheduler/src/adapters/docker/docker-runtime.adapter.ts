// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/adapters/docker/docker-runtime`
 * Purpose: Implements ContainerRuntimePort using dockerode over the engine's unix socket.
 * Scope: Container listing, inspect-by-short-id, /events streaming, exec with combined output. Does not schedule or reconcile.
 * Invariants:
 *   - 404 from inspect maps to { found: false }; other errors propagate
 *   - streamEvents ends quietly on abort; a transport error without abort is rethrown
 *   - exec runs with Tty: true so stdout and stderr arrive as one undemuxed stream
 *   - The exit code is polled until Docker reports it; -1 only after the deadline
 * Side-effects: IO (Docker Engine API)
 * Links: packages/scheduler-core/src/ports/container-runtime.port.ts
 * @internal
 */

import { createInterface } from "node:readline";
import { Readable } from "node:stream";

import {
  type ContainerLookup,
  type ContainerRef,
  ContainerRuntimeUnavailableError,
  type ContainerRuntimePort,
  type ExecResult,
  type LifecycleEvent,
  SHORT_ID_LENGTH,
  type StreamEventsOptions,
} from "@labelcron/scheduler-core";
import Docker from "dockerode";
import type { Logger } from "pino";

import { parseDockerEventLine } from "./docker-events.js";

/** Docker can report ExitCode: null briefly after the hijacked stream closes. */
const EXIT_CODE_DEADLINE_MS = 1_000;
const EXIT_CODE_POLL_MS = 30;

/** Docker prefixes container names with "/" in both list and inspect payloads. */
function stripSlash(name: string | undefined): string {
  return (name ?? "").replace(/^\//, "");
}

function isNotFoundError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    err.statusCode === 404
  );
}

function toContainerRef(
  id: string,
  name: string | undefined,
  labels: Record<string, string> | null | undefined
): ContainerRef {
  return {
    id,
    shortId: id.slice(0, SHORT_ID_LENGTH),
    name: stripSlash(name),
    labels: { ...labels },
  };
}

export interface DockerRuntimeConfig {
  socketPath: string;
  logger: Logger;
  /** Injected client (tests); defaults to a client on socketPath */
  docker?: Docker;
  /** How long to poll exec.inspect() for an exit code (default 1s) */
  exitCodeDeadlineMs?: number;
}

export class DockerContainerRuntime implements ContainerRuntimePort {
  private readonly docker: Docker;
  private readonly socketPath: string;
  private readonly log: Logger;
  private readonly exitCodeDeadlineMs: number;

  constructor(config: DockerRuntimeConfig) {
    this.socketPath = config.socketPath;
    this.exitCodeDeadlineMs =
      config.exitCodeDeadlineMs ?? EXIT_CODE_DEADLINE_MS;
    this.docker = config.docker ?? new Docker({ socketPath: config.socketPath });
    this.log = config.logger.child({ component: "DockerContainerRuntime" });
  }

  async ping(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (err) {
      throw new ContainerRuntimeUnavailableError(
        this.socketPath,
        err instanceof Error ? err : undefined
      );
    }
  }

  async listRunningContainers(): Promise<ContainerRef[]> {
    const containers = await this.docker.listContainers();
    return containers.map((c) => toContainerRef(c.Id, c.Names[0], c.Labels));
  }

  async getContainerByShortId(shortId: string): Promise<ContainerLookup> {
    try {
      const info = await this.docker.getContainer(shortId).inspect();
      return {
        found: true,
        container: toContainerRef(info.Id, info.Name, info.Config.Labels),
      };
    } catch (err) {
      if (isNotFoundError(err)) {
        return { found: false };
      }
      throw err;
    }
  }

  async *streamEvents(
    options: StreamEventsOptions
  ): AsyncIterable<LifecycleEvent> {
    const { signal } = options;
    if (signal.aborted) return;

    const stream = await this.docker.getEvents({
      filters: { type: ["container"] },
    });
    // Aborted while the request was pending: the abort event is already gone
    if (signal.aborted) {
      if (stream instanceof Readable) stream.destroy();
      return;
    }
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    const state: { closed: boolean; error?: Error } = { closed: false };

    const close = (): void => {
      if (state.closed) return;
      state.closed = true;
      lines.close();
      if (stream instanceof Readable) stream.destroy();
    };
    stream.on("error", (err: Error) => {
      state.error = err;
      close();
    });
    signal.addEventListener("abort", close, { once: true });

    try {
      for await (const line of lines) {
        const event = parseDockerEventLine(line);
        if (!event) {
          this.log.debug({ line }, "Skipping unrecognised event line");
          continue;
        }
        yield event;
      }
    } finally {
      signal.removeEventListener("abort", close);
      close();
    }

    if (state.error && !signal.aborted) {
      throw state.error;
    }
  }

  async execInContainer(
    containerId: string,
    cmd: readonly string[]
  ): Promise<ExecResult> {
    const exec = await this.docker.getContainer(containerId).exec({
      Cmd: [...cmd],
      AttachStdout: true,
      AttachStderr: true,
      Tty: true,
    });

    const stream = await exec.start({ hijack: true, stdin: false });
    const chunks: Buffer[] = [];

    await new Promise<void>((resolve, reject) => {
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("end", () => resolve());
      stream.on("close", () => resolve());
      stream.on("error", (err: Error) => reject(err));
    });

    return {
      exitCode: await this.waitForExitCode(exec, containerId),
      output: Buffer.concat(chunks).toString("utf8"),
    };
  }

  private async waitForExitCode(
    exec: Docker.Exec,
    containerId: string
  ): Promise<number> {
    const deadline = Date.now() + this.exitCodeDeadlineMs;
    for (;;) {
      const info = await exec.inspect();
      if (typeof info.ExitCode === "number") return info.ExitCode;
      if (Date.now() >= deadline) {
        this.log.warn(
          { containerId, running: info.Running },
          "Exec exit code not reported before deadline"
        );
        return -1;
      }
      await new Promise((r) => setTimeout(r, EXIT_CODE_POLL_MS));
    }
  }
}
