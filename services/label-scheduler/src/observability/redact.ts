// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not job commands or output).
 * Side-effects: none
 * Links: Imported by observability/logger.ts
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // Registry credentials that dockerode errors can echo back
  "authconfig",
  "auth.password",
  "auth.identitytoken",
  "err.authconfig",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
];
