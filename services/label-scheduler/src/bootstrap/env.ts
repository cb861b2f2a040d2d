// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction; reads process.env and nothing else.
 * Invariants:
 * - Every var has a default; the service starts with an empty environment
 * - TZ must be an IANA zone the runtime's Intl knows
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: main.ts, bootstrap/container.ts
 * @internal
 */

import { z } from "zod";

function isKnownTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const EnvSchema = z.object({
  /** Unix socket of the container runtime */
  DOCKER_SOCKET_PATH: z.string().min(1).default("/var/run/docker.sock"),

  /** IANA timezone cron schedules are evaluated in (default: UTC) */
  TZ: z
    .string()
    .min(1)
    .default("UTC")
    .refine(isKnownTimezone, { message: "TZ must be a valid IANA timezone" }),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: label-scheduler) */
  SERVICE_NAME: z.string().default("label-scheduler"),

  /** Health endpoint port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses an env-like record. Throws on invalid config with one line per issue.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
