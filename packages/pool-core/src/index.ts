// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core`
 * Purpose: Pure domain logic for the staking pool ledger, shared by the engine, persistence adapters and the keeper service.
 * Scope: Re-exports model types, accounting rules, events, errors and port interfaces. Does not contain I/O or infrastructure code.
 * Invariants: No imports from services/. Pure domain logic only.
 * Side-effects: none
 * Links: docs/pool-accounting.md
 * @public
 */

// Ports
export type { AccessPolicy } from "./access";
export { type Clock, SystemClock } from "./clock";
// Errors
export {
  AccountInvariantError,
  DepositCapExceededError,
  DepositFailedError,
  hasPoolErrorCode,
  InsufficientSharesError,
  InvalidAmountError,
  InvalidDepositCapError,
  isPoolError,
  NotEnoughBalanceError,
  NothingToWithdrawError,
  type PoolError,
  type PoolErrorCode,
  PoolNotSuspendedError,
  PoolSuspendedError,
  ReentrantCallError,
  TransferFailedError,
  UnauthorizedError,
  ZeroAddressError,
  ZeroAmountError,
} from "./errors";
// Events
export type {
  DepositCapUpdatedEvent,
  DepositEvent,
  EmergencyWithdrawalEvent,
  PausedEvent,
  PoolEvent,
  PoolEventType,
  RewardAssignmentEvent,
  SerializedPoolEvent,
  TreasuryWithdrawalEvent,
  UnpausedEvent,
  WithdrawalEvent,
} from "./events";
export {
  eventParticipant,
  parsePoolEvent,
  POOL_EVENT_TYPES,
  serializePoolEvent,
} from "./events";
// Model
export type {
  PoolRole,
  PoolState,
  UserAccount,
  UserAccountRecord,
} from "./model";
export { EMPTY_ACCOUNT, initialPoolState, POOL_ROLES } from "./model";
// Rules
export {
  assertUnsigned,
  claimValue,
  computeYield,
  scaledAmountForDeposit,
  scaledDebitFor,
  sharesReleasedFor,
} from "./rules";
export type { PoolCommit, PoolStore, Settlement } from "./store";
export type { RateVault } from "./vault";
