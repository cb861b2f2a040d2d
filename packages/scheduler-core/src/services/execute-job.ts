// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/scheduler-core/services/execute-job`
 * Purpose: Fire-time handler that runs a job's command inside its container.
 * Scope: One exec per fire, outcome logged. Does not retry; the next cron fire is the only retry.
 * Invariants:
 * - FAILURE_CONTAINED: the returned promise never rejects, whatever the exit code or transport error
 * - Command always runs through `/bin/sh -c` so pipes and redirection work
 * Side-effects: IO (exec in container via ContainerRuntimePort)
 * Links: src/ports/container-runtime.port.ts, src/services/job-table.ts
 * @public
 */

import type { LoggerLike } from "../logger.js";
import type { ContainerRuntimePort } from "../ports/index.js";
import type { JobRecord } from "../types.js";
import type { JobExecutor } from "./job-table.js";

export const SHELL = "/bin/sh";

export interface ExecuteJobDeps {
  runtime: Pick<ContainerRuntimePort, "execInContainer">;
  log: LoggerLike;
  /** Injectable clock for duration measurement */
  now?: () => number;
}

export function shellCommand(command: string): string[] {
  return [SHELL, "-c", command];
}

export function createJobExecutor(deps: ExecuteJobDeps): JobExecutor {
  const { runtime, log } = deps;
  const now = deps.now ?? Date.now;

  return async (record: JobRecord): Promise<void> => {
    const context = {
      jobId: record.id,
      containerId: record.containerShortId,
      containerName: record.containerName,
    };
    const startedAt = now();
    log.info(context, "Running job");

    try {
      const result = await runtime.execInContainer(
        record.containerShortId,
        shellCommand(record.command)
      );

      if (result.exitCode !== 0) {
        log.error(
          { ...context, exitCode: result.exitCode, output: result.output },
          "Job exited with non-zero code"
        );
        return;
      }

      log.debug(
        { ...context, durationMs: now() - startedAt, output: result.output },
        "Job completed"
      );
    } catch (err) {
      log.error(
        { ...context, err: err instanceof Error ? err.message : String(err) },
        "Error running job"
      );
    }
  };
}
