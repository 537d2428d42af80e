// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/errors`
 * Purpose: Domain error classes for pool operations.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants:
 * - All errors have a readonly `code` discriminant for type guards.
 * - An operation that throws one of these has persisted nothing.
 * Side-effects: none
 * Links: docs/pool-accounting.md#errors
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";

import type { PoolRole } from "./model";

// ---------------------------------------------------------------------------
// Invalid input
// ---------------------------------------------------------------------------

export class ZeroAmountError extends Error {
  public readonly code = "ZERO_AMOUNT" as const;
  constructor(public readonly operation: string) {
    super(`${operation}: amount must be greater than zero`);
    this.name = "ZeroAmountError";
  }
}

export class InvalidAmountError extends Error {
  public readonly code = "INVALID_AMOUNT" as const;
  constructor(
    public readonly operation: string,
    public readonly amount: bigint
  ) {
    super(`${operation}: amount must be an unsigned integer, got ${amount}`);
    this.name = "InvalidAmountError";
  }
}

export class ZeroAddressError extends Error {
  public readonly code = "ZERO_ADDRESS" as const;
  constructor(public readonly operation: string) {
    super(`${operation}: the zero address is not a valid participant`);
    this.name = "ZeroAddressError";
  }
}

// ---------------------------------------------------------------------------
// Capacity
// ---------------------------------------------------------------------------

export class DepositCapExceededError extends Error {
  public readonly code = "DEPOSIT_CAP_EXCEEDED" as const;
  constructor(
    public readonly depositCap: bigint,
    public readonly poolValue: bigint,
    public readonly amount: bigint
  ) {
    super(
      `Deposit of ${amount} would raise pool value ${poolValue} above cap ${depositCap}`
    );
    this.name = "DepositCapExceededError";
  }
}

// ---------------------------------------------------------------------------
// Insufficiency
// ---------------------------------------------------------------------------

export class InsufficientSharesError extends Error {
  public readonly code = "INSUFFICIENT_SHARES" as const;
  constructor(
    /** Participant address, "pool" or "treasury" */
    public readonly holder: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      `Insufficient shares for ${holder}: requested ${requested}, available ${available}`
    );
    this.name = "InsufficientSharesError";
  }
}

export class NotEnoughBalanceError extends Error {
  public readonly code = "NOT_ENOUGH_BALANCE" as const;
  constructor(
    public readonly user: ParticipantAddress,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      `Not enough balance for ${user}: requested ${requested}, claim is ${available}`
    );
    this.name = "NotEnoughBalanceError";
  }
}

export class NothingToWithdrawError extends Error {
  public readonly code = "NOTHING_TO_WITHDRAW" as const;
  constructor(public readonly user: ParticipantAddress) {
    super(`Nothing to withdraw for ${user}`);
    this.name = "NothingToWithdrawError";
  }
}

// ---------------------------------------------------------------------------
// Integration
// ---------------------------------------------------------------------------

export class DepositFailedError extends Error {
  public readonly code = "DEPOSIT_FAILED" as const;
  constructor(
    public readonly user: ParticipantAddress,
    public readonly shares: bigint,
    /** Shares the vault reported moving; anything but `shares` is a failure */
    public readonly reported: bigint = 0n
  ) {
    super(
      `Vault moved ${reported} of ${shares} requested shares from ${user}`
    );
    this.name = "DepositFailedError";
  }
}

export class TransferFailedError extends Error {
  public readonly code = "TRANSFER_FAILED" as const;
  constructor(
    public readonly to: ParticipantAddress,
    public readonly shares: bigint,
    public readonly reported: bigint = 0n
  ) {
    super(`Vault moved ${reported} of ${shares} requested shares to ${to}`);
    this.name = "TransferFailedError";
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class InvalidDepositCapError extends Error {
  public readonly code = "INVALID_DEPOSIT_CAP" as const;
  constructor(
    public readonly requestedCap: bigint,
    public readonly poolValue: bigint
  ) {
    super(
      requestedCap <= 0n
        ? "Deposit cap must be greater than zero"
        : `Deposit cap ${requestedCap} is below current pool value ${poolValue}`
    );
    this.name = "InvalidDepositCapError";
  }
}

// ---------------------------------------------------------------------------
// Operating mode and access
// ---------------------------------------------------------------------------

export class PoolSuspendedError extends Error {
  public readonly code = "POOL_SUSPENDED" as const;
  constructor(public readonly operation: string) {
    super(`${operation} is not available while the pool is suspended`);
    this.name = "PoolSuspendedError";
  }
}

export class PoolNotSuspendedError extends Error {
  public readonly code = "POOL_NOT_SUSPENDED" as const;
  constructor(public readonly operation: string) {
    super(`${operation} is only available while the pool is suspended`);
    this.name = "PoolNotSuspendedError";
  }
}

export class UnauthorizedError extends Error {
  public readonly code = "UNAUTHORIZED" as const;
  constructor(
    public readonly actor: ParticipantAddress,
    public readonly role: PoolRole
  ) {
    super(`${actor} does not hold role ${role}`);
    this.name = "UnauthorizedError";
  }
}

// ---------------------------------------------------------------------------
// Safety
// ---------------------------------------------------------------------------

export class ReentrantCallError extends Error {
  public readonly code = "REENTRANT_CALL" as const;
  constructor(
    public readonly operation: string,
    public readonly activeOperation: string
  ) {
    super(`${operation} called while ${activeOperation} is still running`);
    this.name = "ReentrantCallError";
  }
}

export class AccountInvariantError extends Error {
  public readonly code = "ACCOUNT_INVARIANT_VIOLATION" as const;
  constructor(
    public readonly user: ParticipantAddress,
    public readonly detail: string
  ) {
    super(`Account ${user} is inconsistent: ${detail}`);
    this.name = "AccountInvariantError";
  }
}

// ---------------------------------------------------------------------------
// Union + type guards
// ---------------------------------------------------------------------------

export type PoolError =
  | ZeroAmountError
  | InvalidAmountError
  | ZeroAddressError
  | DepositCapExceededError
  | InsufficientSharesError
  | NotEnoughBalanceError
  | NothingToWithdrawError
  | DepositFailedError
  | TransferFailedError
  | InvalidDepositCapError
  | PoolSuspendedError
  | PoolNotSuspendedError
  | UnauthorizedError
  | ReentrantCallError
  | AccountInvariantError;

export type PoolErrorCode = PoolError["code"];

const POOL_ERROR_CLASSES = [
  ZeroAmountError,
  InvalidAmountError,
  ZeroAddressError,
  DepositCapExceededError,
  InsufficientSharesError,
  NotEnoughBalanceError,
  NothingToWithdrawError,
  DepositFailedError,
  TransferFailedError,
  InvalidDepositCapError,
  PoolSuspendedError,
  PoolNotSuspendedError,
  UnauthorizedError,
  ReentrantCallError,
  AccountInvariantError,
] as const;

export function isPoolError(error: unknown): error is PoolError {
  return POOL_ERROR_CLASSES.some((cls) => error instanceof cls);
}

/** Narrow to the pool error carrying `code`. */
export function hasPoolErrorCode<C extends PoolErrorCode>(
  error: unknown,
  code: C
): error is Extract<PoolError, { code: C }> {
  return isPoolError(error) && error.code === code;
}
