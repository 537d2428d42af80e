// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-client/adapters/drizzle-pool-store`
 * Purpose: Drizzle ORM implementation of the PoolStore port.
 * Scope: One adapter instance per pool_id. Does not contain domain logic or define port interfaces.
 * Invariants:
 * - ONE_UNIT_OF_WORK: commit() runs in a single transaction (pool upsert, account upsert, event inserts).
 * - The settlement runs last inside that transaction; its rejection rolls every write back.
 * - EVENTS_APPEND_ONLY: events are only inserted.
 * - Events are re-validated with parsePoolEvent on read.
 * Side-effects: IO (database operations)
 * Links: packages/pool-core/src/store.ts
 * @public
 */

import { poolAccounts, poolEvents, poolState } from "@stakepool/db-schema";
import type { ParticipantAddress } from "@stakepool/ids";
import {
  EMPTY_ACCOUNT,
  parsePoolEvent,
  type PoolCommit,
  type PoolEvent,
  type PoolState,
  type PoolStore,
  type Settlement,
  type UserAccount,
  type UserAccountRecord,
} from "@stakepool/pool-core";
import { and, eq } from "drizzle-orm";

import type { Database } from "../client";
import {
  toAccountRecord,
  toAccountValues,
  toEventValues,
  toPoolState,
  toPoolStateValues,
} from "./pool-rows";

export class DrizzlePoolStore implements PoolStore {
  constructor(
    private readonly db: Database,
    private readonly poolId: string
  ) {}

  async loadPool(): Promise<PoolState | null> {
    const [row] = await this.db
      .select()
      .from(poolState)
      .where(eq(poolState.poolId, this.poolId))
      .limit(1);
    return row ? toPoolState(row) : null;
  }

  async loadAccount(address: ParticipantAddress): Promise<UserAccount> {
    const [row] = await this.db
      .select()
      .from(poolAccounts)
      .where(
        and(
          eq(poolAccounts.poolId, this.poolId),
          eq(poolAccounts.address, address)
        )
      )
      .limit(1);
    if (!row) return EMPTY_ACCOUNT;
    const { scaledBalance, shares } = toAccountRecord(row);
    return { scaledBalance, shares };
  }

  async listAccounts(): Promise<UserAccountRecord[]> {
    const rows = await this.db
      .select()
      .from(poolAccounts)
      .where(eq(poolAccounts.poolId, this.poolId))
      .orderBy(poolAccounts.address);
    return rows.map(toAccountRecord);
  }

  async listEvents(): Promise<PoolEvent[]> {
    const rows = await this.db
      .select({ payload: poolEvents.payload })
      .from(poolEvents)
      .where(eq(poolEvents.poolId, this.poolId))
      .orderBy(poolEvents.id);
    return rows.map((row) => parsePoolEvent(row.payload));
  }

  async commit(unit: PoolCommit, settle?: Settlement): Promise<void> {
    const now = new Date();
    const pool = toPoolStateValues(this.poolId, unit.pool);

    await this.db.transaction(async (tx) => {
      await tx
        .insert(poolState)
        .values(pool)
        .onConflictDoUpdate({
          target: poolState.poolId,
          set: {
            totalShares: pool.totalShares,
            treasuryShares: pool.treasuryShares,
            poolValue: pool.poolValue,
            accumulatedScaledBalance: pool.accumulatedScaledBalance,
            depositCap: pool.depositCap,
            paused: pool.paused,
            lastRewardAt: pool.lastRewardAt,
            updatedAt: now,
          },
        });

      if (unit.account) {
        const values = toAccountValues(this.poolId, unit.account);
        await tx
          .insert(poolAccounts)
          .values(values)
          .onConflictDoUpdate({
            target: [poolAccounts.poolId, poolAccounts.address],
            set: {
              scaledBalance: values.scaledBalance,
              shares: values.shares,
              updatedAt: now,
            },
          });
      }

      if (unit.events.length > 0) {
        await tx
          .insert(poolEvents)
          .values(unit.events.map((event) => toEventValues(this.poolId, event)));
      }

      if (settle) {
        await settle();
      }
    });
  }
}
