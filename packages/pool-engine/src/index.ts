// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine`
 * Purpose: Staking pool ledger engine and its in-process adapters.
 * Scope: Re-exports StakingPool, PoolLock, InMemoryPoolStore, StaticAccessPolicy. Does not contain database or chain adapters.
 * Side-effects: none
 * Links: docs/pool-accounting.md
 * @public
 */

export { InMemoryPoolStore } from "./in-memory-pool-store";
export { PoolLock } from "./pool-lock";
export { type StakingPoolDeps, StakingPool } from "./staking-pool";
export { type RoleGrants, StaticAccessPolicy } from "./static-access-policy";
