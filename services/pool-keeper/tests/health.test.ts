// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/tests/health`
 * Purpose: Probe endpoints of the health server, bound to an ephemeral loopback port.
 * @internal
 */

import type { Server } from "node:http";
import { once } from "node:events";
import { afterEach, describe, expect, it } from "vitest";

import {
  type HealthState,
  MAX_CONSECUTIVE_TICK_FAILURES,
  readiness,
  startHealthServer,
} from "../src/health.js";
import type { KeeperStatus } from "../src/keeper.js";

let server: Server | null = null;

async function start(state: HealthState): Promise<string> {
  server = startHealthServer(state, 0, "pool-keeper");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("health server is not bound to a TCP port");
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  if (server) {
    server.closeAllConnections();
    server.close();
    await once(server, "close");
    server = null;
  }
});

describe("startHealthServer", () => {
  it("reports liveness regardless of readiness", async () => {
    const base = await start({ ready: false });

    const res = await fetch(`${base}/livez`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("ok");
  });

  it("follows the mutable ready flag", async () => {
    const state: HealthState = { ready: false };
    const base = await start(state);

    expect((await fetch(`${base}/readyz`)).status).toBe(503);
    state.ready = true;
    expect((await fetch(`${base}/readyz`)).status).toBe(200);
  });

  it("reports keeper status on /readyz", async () => {
    const status: KeeperStatus = {
      lastOutcome: "assigned",
      lastTickAt: "2026-01-05T12:00:00.000Z",
      consecutiveFailures: 0,
    };
    const base = await start({ ready: true, keeper: () => status });

    const res = await fetch(`${base}/readyz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      lastOutcome: "assigned",
      lastTickAt: "2026-01-05T12:00:00.000Z",
      consecutiveFailures: 0,
    });
  });

  it("serves version metadata and 404s unknown paths", async () => {
    const base = await start({ ready: true });

    const version = await fetch(`${base}/version`);
    expect(await version.json()).toMatchObject({ service: "pool-keeper" });
    expect((await fetch(`${base}/metrics`)).status).toBe(404);
  });
});

describe("readiness", () => {
  const failing = (consecutiveFailures: number): HealthState => ({
    ready: true,
    keeper: () => ({
      lastOutcome: "failed",
      lastTickAt: "2026-01-05T12:00:00.000Z",
      consecutiveFailures,
    }),
  });

  it("stays ready through isolated tick failures", () => {
    expect(readiness(failing(MAX_CONSECUTIVE_TICK_FAILURES - 1)).status).toBe(
      200
    );
  });

  it("turns unready once ticks keep failing", () => {
    expect(readiness(failing(MAX_CONSECUTIVE_TICK_FAILURES))).toEqual({
      status: 503,
      body: {
        status: "reward ticks failing",
        lastOutcome: "failed",
        lastTickAt: "2026-01-05T12:00:00.000Z",
        consecutiveFailures: 3,
      },
    });
  });

  it("is unready before startup regardless of keeper status", () => {
    expect(readiness({ ready: false })).toEqual({
      status: 503,
      body: { status: "not ready" },
    });
  });
});
