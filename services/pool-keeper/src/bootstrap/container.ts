// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/bootstrap/container`
 * Purpose: Composition root: wires concrete adapters to the pool engine's ports.
 * Scope: All adapter construction lives here. Returns the engine, the keeper and a close hook.
 * Invariants:
 * - Only file that imports concrete adapter packages (@stakepool/db-client, viem clients)
 * - Without DATABASE_URL the pool runs on InMemoryPoolStore (state lost on restart)
 * Side-effects: Creates DB connection pool and RPC clients (lazy; no I/O until first call)
 * @internal
 */

import { createPoolDbClient, DrizzlePoolStore } from "@stakepool/db-client";
import type { PoolStore } from "@stakepool/pool-core";
import { SystemClock } from "@stakepool/pool-core";
import {
  InMemoryPoolStore,
  StakingPool,
  StaticAccessPolicy,
} from "@stakepool/pool-engine";
import { createPublicClient, createWalletClient, http } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { chainFor } from "../adapters/chains.js";
import { ViemRateVault } from "../adapters/viem-rate-vault.adapter.js";
import { RewardKeeper } from "../keeper.js";
import type { Logger } from "../observability/logger.js";
import type { Env } from "./env.js";

export interface KeeperContainer {
  readonly pool: StakingPool;
  readonly keeper: RewardKeeper;
  readonly logger: Logger;
  /** Stop the keeper and release the DB pool */
  close(): Promise<void>;
}

/**
 * Build the container from validated env and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(config: Env, logger: Logger): KeeperContainer {
  const chain = chainFor(config.CHAIN_ID);
  const transport = http(config.EVM_RPC_URL);
  const publicClient = createPublicClient({ chain, transport });
  const walletClient = createWalletClient({
    account: privateKeyToAccount(config.POOL_OPERATOR_PRIVATE_KEY),
    chain,
    transport,
  });

  const db = config.DATABASE_URL
    ? createPoolDbClient(config.DATABASE_URL, config.SERVICE_NAME)
    : null;
  let store: PoolStore;
  if (db) {
    store = new DrizzlePoolStore(db, config.POOL_ID);
  } else {
    logger.warn(
      { poolId: config.POOL_ID },
      "DATABASE_URL not set; pool state is kept in memory only"
    );
    store = new InMemoryPoolStore();
  }

  const pool = new StakingPool({
    store,
    vault: new ViemRateVault({
      publicClient,
      walletClient,
      token: config.SHARES_TOKEN_ADDRESS,
      logger: logger.child({ component: "rate-vault" }),
    }),
    access: new StaticAccessPolicy({
      admin: config.ADMIN_ADDRESSES,
      "pause-operator": config.PAUSE_OPERATOR_ADDRESSES,
    }),
    clock: new SystemClock(),
    logger: logger.child({ poolId: config.POOL_ID }),
    poolAddress: config.POOL_ADDRESS,
    initialDepositCap: config.INITIAL_DEPOSIT_CAP,
  });

  const keeper = new RewardKeeper({
    pool,
    intervalMs: config.REWARD_INTERVAL_MS,
    logger: logger.child({ component: "reward-keeper" }),
  });

  return {
    pool,
    keeper,
    logger,
    close: async () => {
      await keeper.stop();
      if (db) {
        await db.$client.end();
      }
    },
  };
}
