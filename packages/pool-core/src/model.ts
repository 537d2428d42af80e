// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/model`
 * Purpose: Domain types for the staking pool ledger.
 * Scope: Pure types and constructors. Does not contain business logic or perform I/O.
 * Invariants: All share/value/scaled fields are bigint (ALL_MATH_BIGINT); never negative once committed.
 * Side-effects: none
 * Links: docs/pool-accounting.md
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";

/** Roles consulted by the access policy */
export const POOL_ROLES = ["admin", "pause-operator"] as const;
export type PoolRole = (typeof POOL_ROLES)[number];

/**
 * Pool-wide aggregates. One row per pool.
 * `poolValue` is the value of `totalShares` at the last synchronization point.
 */
export interface PoolState {
  /** Shares owned by depositors (treasury shares excluded) */
  readonly totalShares: bigint;
  /** Shares skimmed from positive yield, owned by the operator */
  readonly treasuryShares: bigint;
  readonly poolValue: bigint;
  /** Σ of every account's scaledBalance */
  readonly accumulatedScaledBalance: bigint;
  /** Last time yield was skimmed; informational only */
  readonly lastRewardAt: Date | null;
  /** maxTotalDeposit, in value units */
  readonly depositCap: bigint;
  /** true = suspended; only emergency exit and admin calls are served */
  readonly paused: boolean;
}

export interface UserAccount {
  /** Claim in scaled units: value = scaledBalance * poolValue / accumulatedScaledBalance */
  readonly scaledBalance: bigint;
  /** Per-user share cap, reduced in proportion to scaledBalance on withdrawal */
  readonly shares: bigint;
}

export interface UserAccountRecord extends UserAccount {
  readonly address: ParticipantAddress;
}

export const EMPTY_ACCOUNT: UserAccount = Object.freeze({
  scaledBalance: 0n,
  shares: 0n,
});

/** State of a freshly deployed pool: every counter zero, running. */
export function initialPoolState(depositCap: bigint): PoolState {
  return {
    totalShares: 0n,
    treasuryShares: 0n,
    poolValue: 0n,
    accumulatedScaledBalance: 0n,
    lastRewardAt: null,
    depositCap,
    paused: false,
  };
}
