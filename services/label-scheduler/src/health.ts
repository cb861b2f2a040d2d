// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/health`
 * Purpose: Health endpoint HTTP server for orchestrator probes and job diagnostics.
 * Scope: /livez (liveness), /readyz (readiness), /version, /jobs (current job ids).
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - /jobs returns a snapshot; it never mutates the table
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * Links: main.ts
 * @internal
 */

import { createServer, type RequestListener, type Server } from "node:http";

export interface HealthState {
  ready: boolean;
}

export interface HealthDiagnostics {
  listJobIds(): string[];
}

/** Build metadata from env vars (set at build time or runtime) */
const versionInfo = {
  sha: process.env.GIT_SHA ?? "unknown",
  service: "label-scheduler",
  buildTs: process.env.BUILD_TS ?? "unknown",
  imageDigest: process.env.IMAGE_DIGEST ?? "unknown",
};

export function createHealthHandler(
  state: HealthState,
  diagnostics: HealthDiagnostics
): RequestListener {
  return (req, res) => {
    if (req.url === "/livez") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else if (req.url === "/readyz") {
      if (state.ready) {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("ok");
      } else {
        res.writeHead(503, { "Content-Type": "text/plain" });
        res.end("not ready");
      }
    } else if (req.url === "/version") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(versionInfo));
    } else if (req.url === "/jobs") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(diagnostics.listJobIds().sort()));
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("not found");
    }
  };
}

export function startHealthServer(
  state: HealthState,
  port: number,
  diagnostics: HealthDiagnostics
): Server {
  const server = createServer(createHealthHandler(state, diagnostics));
  server.listen(port);
  return server;
}
