// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine/in-memory-pool-store`
 * Purpose: Process-local PoolStore for tests and for running the keeper without a database.
 * Scope: Implements PoolStore with plain maps. Does not survive restarts.
 * Invariants: commit() applies pool, account and events together, after the settlement resolves and never if it rejects.
 * Side-effects: none (in-memory only)
 * Links: packages/pool-core/src/store.ts
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";
import {
  EMPTY_ACCOUNT,
  type PoolCommit,
  type PoolEvent,
  type PoolState,
  type PoolStore,
  type Settlement,
  type UserAccount,
  type UserAccountRecord,
} from "@stakepool/pool-core";

export class InMemoryPoolStore implements PoolStore {
  private pool: PoolState | null = null;
  private readonly accounts = new Map<ParticipantAddress, UserAccount>();
  private readonly events: PoolEvent[] = [];

  /** Number of successful commits (for assertions) */
  public commits = 0;

  async loadPool(): Promise<PoolState | null> {
    return this.pool;
  }

  async loadAccount(address: ParticipantAddress): Promise<UserAccount> {
    return this.accounts.get(address) ?? EMPTY_ACCOUNT;
  }

  async listAccounts(): Promise<UserAccountRecord[]> {
    return [...this.accounts].map(([address, account]) => ({
      address,
      ...account,
    }));
  }

  async listEvents(): Promise<PoolEvent[]> {
    return [...this.events];
  }

  async commit(unit: PoolCommit, settle?: Settlement): Promise<void> {
    if (settle) {
      await settle();
    }
    this.pool = unit.pool;
    if (unit.account) {
      const { address, scaledBalance, shares } = unit.account;
      this.accounts.set(address, { scaledBalance, shares });
    }
    this.events.push(...unit.events);
    this.commits += 1;
  }
}
