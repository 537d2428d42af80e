// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-client/adapters/pool-rows`
 * Purpose: Row mappers between pool-core domain types and the pool_* tables.
 * Scope: Pure conversions. Does not query.
 * Invariants: NUMERIC columns travel as decimal strings; addresses are re-validated on read.
 * Side-effects: none
 * @internal
 */

import type { poolAccounts, poolEvents, poolState } from "@stakepool/db-schema";
import { toParticipantAddress } from "@stakepool/ids";
import {
  eventParticipant,
  type PoolEvent,
  type PoolState,
  serializePoolEvent,
  type UserAccountRecord,
} from "@stakepool/pool-core";

export function toPoolState(row: typeof poolState.$inferSelect): PoolState {
  return {
    totalShares: BigInt(row.totalShares),
    treasuryShares: BigInt(row.treasuryShares),
    poolValue: BigInt(row.poolValue),
    accumulatedScaledBalance: BigInt(row.accumulatedScaledBalance),
    depositCap: BigInt(row.depositCap),
    paused: row.paused,
    lastRewardAt: row.lastRewardAt,
  };
}

export function toPoolStateValues(
  poolId: string,
  pool: PoolState
): typeof poolState.$inferInsert {
  return {
    poolId,
    totalShares: pool.totalShares.toString(),
    treasuryShares: pool.treasuryShares.toString(),
    poolValue: pool.poolValue.toString(),
    accumulatedScaledBalance: pool.accumulatedScaledBalance.toString(),
    depositCap: pool.depositCap.toString(),
    paused: pool.paused,
    lastRewardAt: pool.lastRewardAt,
  };
}

export function toAccountRecord(
  row: typeof poolAccounts.$inferSelect
): UserAccountRecord {
  return {
    address: toParticipantAddress(row.address),
    scaledBalance: BigInt(row.scaledBalance),
    shares: BigInt(row.shares),
  };
}

export function toAccountValues(
  poolId: string,
  account: UserAccountRecord
): typeof poolAccounts.$inferInsert {
  return {
    poolId,
    address: account.address,
    scaledBalance: account.scaledBalance.toString(),
    shares: account.shares.toString(),
  };
}

export function toEventValues(
  poolId: string,
  event: PoolEvent
): typeof poolEvents.$inferInsert {
  return {
    poolId,
    type: event.type,
    participant: eventParticipant(event),
    payload: serializePoolEvent(event),
    occurredAt: event.at,
  };
}
