// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers and flush them on exit. Does not handle request-scoped logging.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none until a logger writes
 * Notes: Reads logging-specific env vars directly (NODE_ENV, LOG_LEVEL, SERVICE_NAME) so a broken config can still be logged.
 * Links: REDACT_PATHS in ./redact
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

type Destination = ReturnType<typeof pino.destination>;

const destinations = new Set<Destination>();

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const logLevel = process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "pool-keeper";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level: logLevel,
    enabled: !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, app: "stakepool", service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  // Sync in dev for immediate crash visibility, async in prod
  const destination = pino.destination({
    dest: 1,
    sync: nodeEnv !== "production",
    minLength: 4096,
  });
  destinations.add(destination);

  return pino(config, destination);
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Drain buffered output before process.exit(). */
export function flushLogger(): void {
  for (const destination of destinations) {
    try {
      destination.flushSync();
    } catch (error) {
      process.stderr.write(`log flush failed: ${String(error)}\n`);
    }
  }
}
