// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-client`
 * Purpose: Postgres persistence for the staking pool: client factory, PoolStore adapter, schema.
 * Scope: Client factory, adapters, schema re-export. Does not read from environment.
 * Invariants: FORBIDDEN: process.env
 * Side-effects: IO (database operations)
 * @public
 */

// Re-export full schema (consumers get all tables transitively through db-client)
export * from "@stakepool/db-schema";
export { DrizzlePoolStore } from "./adapters/drizzle-pool-store.adapter";
export {
  toAccountRecord,
  toAccountValues,
  toEventValues,
  toPoolState,
  toPoolStateValues,
} from "./adapters/pool-rows";
export { createPoolDbClient, type Database } from "./client";
