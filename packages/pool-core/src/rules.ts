// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/rules`
 * Purpose: Scaled-balance arithmetic shared by every pool operation (ALL_MATH_BIGINT).
 * Scope: Pure functions. Does not perform I/O, call the vault, or mutate state.
 * Invariants:
 * - All arithmetic uses BigInt; every division rounds against the caller (credits and claims down, debits up).
 * - claimValue(scaledAmountForDeposit(x)) <= x for any pool ratio (no instant profit on entry).
 * - scaledDebitFor(claimValue(s)) <= s (a full withdrawal never debits more than the account holds).
 * Side-effects: none
 * Links: docs/pool-accounting.md#scaled-balances
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";

import { AccountInvariantError, InvalidAmountError } from "./errors";

/**
 * Scaled units credited for a deposit of `finalAmount` value units.
 *
 * The first depositor sets a 1:1 scaled-to-value ratio; later depositors buy in
 * at the prevailing `accumulatedScaledBalance / poolValue` ratio.
 */
export function scaledAmountForDeposit(
  finalAmount: bigint,
  accumulatedScaledBalance: bigint,
  poolValue: bigint
): bigint {
  const multiplier =
    accumulatedScaledBalance > 0n ? accumulatedScaledBalance : 1n;
  const divisor = poolValue > 0n ? poolValue : 1n;
  return (finalAmount * multiplier) / divisor;
}

/**
 * Value units a scaled balance is currently worth.
 * Zero when nothing has ever been deposited.
 */
export function claimValue(
  scaledBalance: bigint,
  poolValue: bigint,
  accumulatedScaledBalance: bigint
): bigint {
  if (accumulatedScaledBalance === 0n) {
    return 0n;
  }
  return (scaledBalance * poolValue) / accumulatedScaledBalance;
}

/**
 * Scaled units to debit for a withdrawal of `finalAmount` value units.
 * Inverse of scaledAmountForDeposit at the current ratio, rounded up so the
 * remainder stays with the other depositors.
 */
export function scaledDebitFor(
  finalAmount: bigint,
  accumulatedScaledBalance: bigint,
  poolValue: bigint
): bigint {
  if (poolValue === 0n) {
    return 0n;
  }
  return (finalAmount * accumulatedScaledBalance + poolValue - 1n) / poolValue;
}

/**
 * Shares to remove from an account whose scaled balance shrinks by `scaledDebit`.
 * Uses the pre-debit scaled balance. A zero scaled balance holding shares is corrupt
 * state, so this fails closed instead of dividing by zero.
 */
export function sharesReleasedFor(
  user: ParticipantAddress,
  account: { readonly shares: bigint; readonly scaledBalance: bigint },
  scaledDebit: bigint
): bigint {
  if (account.scaledBalance === 0n) {
    if (account.shares === 0n) {
      return 0n;
    }
    throw new AccountInvariantError(
      user,
      `holds ${account.shares} shares with a zero scaled balance`
    );
  }
  return (account.shares * scaledDebit) / account.scaledBalance;
}

/**
 * Yield since the last synchronization. Negative on principal loss.
 */
export function computeYield(currentValue: bigint, recordedValue: bigint): bigint {
  return currentValue - recordedValue;
}

/** Guard: value must be a uint. Zero is the caller's call. */
export function assertUnsigned(operation: string, amount: bigint): void {
  if (amount < 0n) {
    throw new InvalidAmountError(operation, amount);
  }
}
