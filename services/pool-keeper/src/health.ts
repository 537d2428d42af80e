// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/health`
 * Purpose: Probe endpoints for the keeper: liveness, readiness backed by reward tick status, build metadata.
 * Scope: /livez, /readyz, /version. Does not trigger ticks or touch the pool.
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 503 before startup completes, during shutdown, and once
 *   MAX_CONSECUTIVE_TICK_FAILURES ticks in a row have failed; 200 otherwise
 * - /readyz body carries the keeper status as JSON
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * @internal
 */

import { createServer, type Server, type ServerResponse } from "node:http";

import type { KeeperStatus } from "./keeper.js";

export const MAX_CONSECUTIVE_TICK_FAILURES = 3;

export interface HealthState {
  ready: boolean;
  keeper?: () => KeeperStatus;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function readiness(state: HealthState): {
  readonly status: number;
  readonly body: Record<string, unknown>;
} {
  if (!state.ready) {
    return { status: 503, body: { status: "not ready" } };
  }
  const keeper = state.keeper?.();
  if (!keeper) {
    return { status: 200, body: { status: "ok" } };
  }
  const degraded =
    keeper.consecutiveFailures >= MAX_CONSECUTIVE_TICK_FAILURES;
  return {
    status: degraded ? 503 : 200,
    body: { status: degraded ? "reward ticks failing" : "ok", ...keeper },
  };
}

export function startHealthServer(
  state: HealthState,
  port: number,
  service: string
): Server {
  const versionInfo = {
    sha: process.env.GIT_SHA ?? "unknown",
    service,
    buildTs: process.env.BUILD_TS ?? "unknown",
  };

  const server = createServer((req, res) => {
    switch (req.url) {
      case "/livez":
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("ok");
        return;
      case "/readyz": {
        const { status, body } = readiness(state);
        sendJson(res, status, body);
        return;
      }
      case "/version":
        sendJson(res, 200, versionInfo);
        return;
      default:
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("not found");
    }
  });

  server.listen(port);
  return server;
}
