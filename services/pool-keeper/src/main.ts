// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/main`
 * Purpose: Service entry point with graceful shutdown. Starts the reward keeper and health server.
 * Scope: Entry point that calls env() and wires the container. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false as soon as shutdown begins
 * Side-effects: IO (RPC, database, HTTP listener, process signals)
 * @public
 */

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { type HealthState, startHealthServer } from "./health.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const config = env();

  // Composition root owns logger creation
  const logger = makeLogger();
  logger.info(
    { logLevel: config.LOG_LEVEL, poolId: config.POOL_ID },
    "Starting pool keeper"
  );

  const healthState: HealthState = { ready: false };
  const healthServer = startHealthServer(
    healthState,
    config.HEALTH_PORT,
    config.SERVICE_NAME
  );
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  const container = createContainer(config, logger);
  const pool = await container.pool.getPool();
  logger.info(
    {
      paused: pool.paused,
      totalShares: pool.totalShares.toString(),
      treasuryShares: pool.treasuryShares.toString(),
      depositCap: pool.depositCap.toString(),
    },
    "Pool state loaded"
  );

  container.keeper.start();
  healthState.keeper = () => container.keeper.status();
  healthState.ready = true;

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false;
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await container.close();
      healthServer.close();
      logger.info({}, "Keeper stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
