// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/store`
 * Purpose: Port interface for pool persistence. Shared by the engine, the in-memory adapter and the Drizzle adapter.
 * Scope: Type definitions only. Does not contain implementations or I/O.
 * Invariants:
 * - ONE_UNIT_OF_WORK: commit() persists pool aggregates, the caller's account and the events together or not at all.
 * - SETTLE_INSIDE: the settlement runs after the writes are staged and before they become visible;
 *   a rejected settlement rolls the writes back, and a write that fails first never runs it.
 * - EVENTS_APPEND_ONLY: committed events are never updated or removed.
 * - ACCOUNTS_NEVER_DELETED: an exited account is stored zeroed.
 * - POOL_SCOPED: an adapter instance serves exactly one pool.
 * Side-effects: none
 * Links: docs/pool-accounting.md
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";

import type { PoolEvent } from "./events";
import type { PoolState, UserAccount, UserAccountRecord } from "./model";

export interface PoolCommit {
  readonly pool: PoolState;
  /** Omitted by operations that touch no account (reward assignment, admin calls) */
  readonly account?: UserAccountRecord;
  readonly events: readonly PoolEvent[];
}

/** External side of a commit (a vault transfer). Rejects when it did not happen. */
export type Settlement = () => Promise<void>;

export interface PoolStore {
  /** null until the first commit */
  loadPool(): Promise<PoolState | null>;
  /** Zeroed account when the address has never deposited */
  loadAccount(address: ParticipantAddress): Promise<UserAccount>;
  listAccounts(): Promise<UserAccountRecord[]>;
  /** Oldest first */
  listEvents(): Promise<PoolEvent[]>;
  commit(unit: PoolCommit, settle?: Settlement): Promise<void>;
}
