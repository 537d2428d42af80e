// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine/staking-pool`
 * Purpose: Ledger engine for one staking pool: reward assignment, deposit, withdrawal, emergency exit and admin operations.
 * Scope: Orchestrates pool-core rules against the RateVault, PoolStore and AccessPolicy ports. Does not own persistence or transport.
 * Invariants:
 *   - ONE_LOCK_PER_POOL: every mutating operation runs inside PoolLock; re-entry rejects with ReentrantCallError
 *   - SYNC_FIRST: deposit and withdraw run reward assignment before their own arithmetic
 *   - SETTLE_IN_COMMIT: the vault transfer runs as the settlement of the store commit, after all bookkeeping is computed.
 *     A failed write never transfers; a failed or short transfer never persists.
 *   - Any thrown error leaves persisted state untouched (working copy discarded)
 *   - EMERGENCY_NO_SYNC: emergency exit neither skims yield nor refreshes poolValue
 * Side-effects: IO (vault calls, store commits, logging)
 * Links: docs/pool-accounting.md, packages/pool-core/src/rules.ts
 * @public
 */

import { isZeroAddress, type ParticipantAddress } from "@stakepool/ids";
import {
  type AccessPolicy,
  assertUnsigned,
  type Clock,
  claimValue,
  computeYield,
  DepositCapExceededError,
  type DepositCapUpdatedEvent,
  type DepositEvent,
  DepositFailedError,
  type EmergencyWithdrawalEvent,
  InsufficientSharesError,
  InvalidDepositCapError,
  initialPoolState,
  NotEnoughBalanceError,
  NothingToWithdrawError,
  type PoolEvent,
  PoolNotSuspendedError,
  type PoolRole,
  type PoolState,
  type PoolStore,
  PoolSuspendedError,
  type RateVault,
  type RewardAssignmentEvent,
  type Settlement,
  scaledAmountForDeposit,
  scaledDebitFor,
  serializePoolEvent,
  sharesReleasedFor,
  TransferFailedError,
  type TreasuryWithdrawalEvent,
  UnauthorizedError,
  type UserAccount,
  type UserAccountRecord,
  type WithdrawalEvent,
  ZeroAddressError,
  ZeroAmountError,
} from "@stakepool/pool-core";
import type { Logger } from "pino";

import { PoolLock } from "./pool-lock";

export interface StakingPoolDeps {
  readonly store: PoolStore;
  readonly vault: RateVault;
  readonly access: AccessPolicy;
  readonly clock: Clock;
  readonly logger: Logger;
  /** Address the vault credits deposited shares to */
  readonly poolAddress: ParticipantAddress;
  /** depositCap of a pool that has never committed */
  readonly initialDepositCap: bigint;
}

interface Synchronized {
  readonly pool: PoolState;
  readonly reward: RewardAssignmentEvent | null;
}

function rewardEvents(reward: RewardAssignmentEvent | null): PoolEvent[] {
  return reward ? [reward] : [];
}

function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

function requireParticipant(
  operation: string,
  address: ParticipantAddress
): void {
  if (isZeroAddress(address)) {
    throw new ZeroAddressError(operation);
  }
}

function requirePositive(operation: string, amount: bigint): void {
  assertUnsigned(operation, amount);
  if (amount === 0n) {
    throw new ZeroAmountError(operation);
  }
}

export class StakingPool {
  private readonly lock = new PoolLock();
  private readonly log: Logger;

  constructor(private readonly deps: StakingPoolDeps) {
    this.log = deps.logger.child({ component: "StakingPool" });
  }

  // ---------------------------------------------------------------------------
  // Reward assignment
  // ---------------------------------------------------------------------------

  /**
   * Skim positive yield since the last synchronization into the treasury.
   * Returns the emitted event, or null when no shares moved.
   */
  async assignRewards(): Promise<RewardAssignmentEvent | null> {
    return this.lock.run("assignRewards", async () => {
      const loaded = await this.loadPool();
      this.requireRunning(loaded, "assignRewards");

      const { pool, reward } = await this.synchronize(loaded);
      if (pool !== loaded) {
        await this.commit(pool, rewardEvents(reward));
      }
      return reward;
    });
  }

  // ---------------------------------------------------------------------------
  // Deposit / withdrawal
  // ---------------------------------------------------------------------------

  /** Returns the value units actually credited (value of the shares pulled in). */
  async deposit(user: ParticipantAddress, amount: bigint): Promise<bigint> {
    requireParticipant("deposit", user);
    requirePositive("deposit", amount);

    return this.lock.run("deposit", async () => {
      const { vault, store } = this.deps;
      const loaded = await this.loadPool();
      this.requireRunning(loaded, "deposit");
      const { pool, reward } = await this.synchronize(loaded);

      const depositShares = await vault.shares(amount);
      if (depositShares === 0n) {
        throw new ZeroAmountError("deposit");
      }
      const finalAmount = await vault.value(depositShares);

      if (pool.poolValue + finalAmount > pool.depositCap) {
        throw new DepositCapExceededError(
          pool.depositCap,
          pool.poolValue,
          finalAmount
        );
      }

      const scaledAmount = scaledAmountForDeposit(
        finalAmount,
        pool.accumulatedScaledBalance,
        pool.poolValue
      );
      const account = await store.loadAccount(user);
      const nextAccount: UserAccountRecord = {
        address: user,
        scaledBalance: account.scaledBalance + scaledAmount,
        shares: account.shares + depositShares,
      };
      const totalShares = pool.totalShares + depositShares;

      const nextPool: PoolState = {
        ...pool,
        totalShares,
        accumulatedScaledBalance: pool.accumulatedScaledBalance + scaledAmount,
        poolValue: await vault.value(totalShares),
      };
      const event: DepositEvent = {
        type: "deposit",
        user,
        amount: finalAmount,
        shares: depositShares,
        at: this.now(),
      };
      await this.commit(
        nextPool,
        [...rewardEvents(reward), event],
        nextAccount,
        this.pullShares(user, depositShares)
      );
      return finalAmount;
    });
  }

  /** Returns the value units actually paid out (value of the shares sent). */
  async withdraw(user: ParticipantAddress, amount: bigint): Promise<bigint> {
    requireParticipant("withdraw", user);
    requirePositive("withdraw", amount);

    return this.lock.run("withdraw", async () => {
      const { vault, store } = this.deps;
      const loaded = await this.loadPool();
      this.requireRunning(loaded, "withdraw");
      const { pool, reward } = await this.synchronize(loaded);

      const account = await store.loadAccount(user);
      const userMaxAmount = claimValue(
        account.scaledBalance,
        pool.poolValue,
        pool.accumulatedScaledBalance
      );
      if (userMaxAmount === 0n) {
        throw new NothingToWithdrawError(user);
      }
      if (amount > userMaxAmount) {
        throw new NotEnoughBalanceError(user, amount, userMaxAmount);
      }

      const withdrawShares = await vault.shares(amount);
      if (withdrawShares === 0n) {
        throw new ZeroAmountError("withdraw");
      }
      const finalAmount = await vault.value(withdrawShares);

      if (withdrawShares > account.shares) {
        throw new InsufficientSharesError(user, withdrawShares, account.shares);
      }
      if (withdrawShares > pool.totalShares) {
        throw new InsufficientSharesError(
          "pool",
          withdrawShares,
          pool.totalShares
        );
      }

      const amountToDebit = minBigInt(
        scaledDebitFor(
          finalAmount,
          pool.accumulatedScaledBalance,
          pool.poolValue
        ),
        account.scaledBalance
      );
      const released = sharesReleasedFor(user, account, amountToDebit);
      const nextAccount: UserAccountRecord = {
        address: user,
        scaledBalance: account.scaledBalance - amountToDebit,
        shares: account.shares - released,
      };
      const totalShares = pool.totalShares - withdrawShares;

      const nextPool: PoolState = {
        ...pool,
        totalShares,
        accumulatedScaledBalance: pool.accumulatedScaledBalance - amountToDebit,
        poolValue: await vault.value(totalShares),
      };
      const event: WithdrawalEvent = {
        type: "withdrawal",
        user,
        amount: finalAmount,
        shares: withdrawShares,
        at: this.now(),
      };
      await this.commit(
        nextPool,
        [...rewardEvents(reward), event],
        nextAccount,
        this.sendShares(user, withdrawShares)
      );
      return finalAmount;
    });
  }

  /**
   * Exit the caller's whole claim at the live rate while the pool is suspended.
   * Returns the value of the shares sent.
   */
  async emergencyWithdraw(user: ParticipantAddress): Promise<bigint> {
    requireParticipant("emergencyWithdraw", user);

    return this.lock.run("emergencyWithdraw", async () => {
      const { vault, store } = this.deps;
      const pool = await this.loadPool();
      if (!pool.paused) {
        throw new PoolNotSuspendedError("emergencyWithdraw");
      }
      if (pool.accumulatedScaledBalance === 0n) {
        throw new ZeroAmountError("emergencyWithdraw");
      }

      const account = await store.loadAccount(user);
      const pooledValue = await vault.value(pool.totalShares);
      const currentAmount = claimValue(
        account.scaledBalance,
        pooledValue,
        pool.accumulatedScaledBalance
      );
      if (currentAmount === 0n) {
        throw new NothingToWithdrawError(user);
      }

      const sharesOut = minBigInt(
        await vault.shares(currentAmount),
        pool.totalShares
      );
      if (sharesOut === 0n) {
        throw new NothingToWithdrawError(user);
      }

      const nextPool: PoolState = {
        ...pool,
        accumulatedScaledBalance:
          pool.accumulatedScaledBalance - account.scaledBalance,
        totalShares: pool.totalShares - sharesOut,
      };
      const nextAccount: UserAccountRecord = {
        address: user,
        scaledBalance: 0n,
        shares: 0n,
      };

      const amountSent = await vault.value(sharesOut);
      const event: EmergencyWithdrawalEvent = {
        type: "emergency-withdrawal",
        user,
        amount: amountSent,
        shares: sharesOut,
        at: this.now(),
      };
      await this.commit(
        nextPool,
        [event],
        nextAccount,
        this.sendShares(user, sharesOut)
      );
      return amountSent;
    });
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  async setDepositCap(actor: ParticipantAddress, newCap: bigint): Promise<void> {
    this.requireRole("admin", actor);
    assertUnsigned("setDepositCap", newCap);

    await this.lock.run("setDepositCap", async () => {
      const pool = await this.loadPool();
      if (newCap <= 0n || newCap < pool.poolValue) {
        throw new InvalidDepositCapError(newCap, pool.poolValue);
      }
      const event: DepositCapUpdatedEvent = {
        type: "deposit-cap-updated",
        previousCap: pool.depositCap,
        newCap,
        at: this.now(),
      };
      await this.commit({ ...pool, depositCap: newCap }, [event]);
    });
  }

  async pause(actor: ParticipantAddress): Promise<void> {
    this.requireRole("pause-operator", actor);

    await this.lock.run("pause", async () => {
      const pool = await this.loadPool();
      this.requireRunning(pool, "pause");
      await this.commit({ ...pool, paused: true }, [
        { type: "paused", by: actor, at: this.now() },
      ]);
    });
  }

  async unpause(actor: ParticipantAddress): Promise<void> {
    this.requireRole("pause-operator", actor);

    await this.lock.run("unpause", async () => {
      const pool = await this.loadPool();
      if (!pool.paused) {
        throw new PoolNotSuspendedError("unpause");
      }
      await this.commit({ ...pool, paused: false }, [
        { type: "unpaused", by: actor, at: this.now() },
      ]);
    });
  }

  /**
   * Send treasury shares worth `amount` to `destination`.
   * Never touches user accounting; available in either mode.
   */
  async adminWithdraw(
    actor: ParticipantAddress,
    amount: bigint,
    destination: ParticipantAddress
  ): Promise<bigint> {
    this.requireRole("admin", actor);
    requirePositive("adminWithdraw", amount);
    requireParticipant("adminWithdraw", destination);

    return this.lock.run("adminWithdraw", async () => {
      const { vault } = this.deps;
      const pool = await this.loadPool();

      const shares = await vault.shares(amount);
      if (shares === 0n) {
        throw new ZeroAmountError("adminWithdraw");
      }
      if (shares > pool.treasuryShares) {
        throw new InsufficientSharesError(
          "treasury",
          shares,
          pool.treasuryShares
        );
      }

      const event: TreasuryWithdrawalEvent = {
        type: "treasury-withdrawal",
        destination,
        amount,
        shares,
        at: this.now(),
      };
      await this.commit(
        { ...pool, treasuryShares: pool.treasuryShares - shares },
        [event],
        undefined,
        this.sendShares(destination, shares)
      );
      return amount;
    });
  }

  // ---------------------------------------------------------------------------
  // Views (read-only, never commit)
  // ---------------------------------------------------------------------------

  async getPool(): Promise<PoolState> {
    return this.loadPool();
  }

  async getAccount(user: ParticipantAddress): Promise<UserAccount> {
    return this.deps.store.loadAccount(user);
  }

  /**
   * Value the caller could extract right now: after a dry-run reward assignment
   * while running, at the live rate while suspended.
   */
  async claimOf(user: ParticipantAddress): Promise<bigint> {
    const loaded = await this.loadPool();
    const account = await this.deps.store.loadAccount(user);
    if (loaded.paused) {
      return claimValue(
        account.scaledBalance,
        await this.deps.vault.value(loaded.totalShares),
        loaded.accumulatedScaledBalance
      );
    }
    const { pool } = await this.synchronize(loaded);
    return claimValue(
      account.scaledBalance,
      pool.poolValue,
      pool.accumulatedScaledBalance
    );
  }

  /** Positive yield accrued since the last synchronization, not yet skimmed */
  async pendingYield(): Promise<bigint> {
    const pool = await this.loadPool();
    if (pool.poolValue === 0n) {
      return 0n;
    }
    const current = await this.deps.vault.value(pool.totalShares);
    const pending = computeYield(current, pool.poolValue);
    return pending > 0n ? pending : 0n;
  }

  async treasuryValue(): Promise<bigint> {
    const pool = await this.loadPool();
    return this.deps.vault.value(pool.treasuryShares);
  }

  async listAccounts(): Promise<UserAccountRecord[]> {
    return this.deps.store.listAccounts();
  }

  async listEvents(): Promise<PoolEvent[]> {
    return this.deps.store.listEvents();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Reward assignment on a working copy. Returns the same object when nothing
   * changed, so callers can skip the commit.
   */
  private async synchronize(pool: PoolState): Promise<Synchronized> {
    if (pool.poolValue === 0n) {
      return { pool, reward: null };
    }
    const { vault } = this.deps;

    const currentValue = await vault.value(pool.totalShares);
    const yieldValue = computeYield(currentValue, pool.poolValue);
    if (yieldValue <= 0n) {
      if (yieldValue === 0n) {
        return { pool, reward: null };
      }
      this.log.warn(
        {
          recordedValue: pool.poolValue.toString(),
          currentValue: currentValue.toString(),
        },
        "pool value fell since last sync; sharing loss"
      );
      return { pool: { ...pool, poolValue: currentValue }, reward: null };
    }

    const sharesYield = minBigInt(await vault.shares(yieldValue), pool.totalShares);
    if (sharesYield === 0n) {
      this.log.debug(
        { yield: yieldValue.toString() },
        "yield below one share; carried forward"
      );
      return { pool, reward: null };
    }

    const totalShares = pool.totalShares - sharesYield;
    const at = this.now();
    return {
      pool: {
        ...pool,
        totalShares,
        treasuryShares: pool.treasuryShares + sharesYield,
        poolValue: await vault.value(totalShares),
        lastRewardAt: at,
      },
      reward: { type: "reward-assignment", sharesYield, totalShares, at },
    };
  }

  private async loadPool(): Promise<PoolState> {
    return (
      (await this.deps.store.loadPool()) ??
      initialPoolState(this.deps.initialDepositCap)
    );
  }

  private async commit(
    pool: PoolState,
    events: readonly PoolEvent[],
    account?: UserAccountRecord,
    settle?: Settlement
  ): Promise<void> {
    await this.deps.store.commit(
      account ? { pool, account, events } : { pool, events },
      settle
    );
    for (const event of events) {
      this.log.info({ event: serializePoolEvent(event) }, `pool ${event.type}`);
    }
  }

  /** Settlement pulling a deposit into the pool address. */
  private pullShares(user: ParticipantAddress, shares: bigint): Settlement {
    return async () => {
      const { vault, poolAddress } = this.deps;
      const received = await vault.transferSharesFrom(user, poolAddress, shares);
      if (received !== shares) {
        this.reportShortfall("transferSharesFrom", user, shares, received);
        throw new DepositFailedError(user, shares, received);
      }
    };
  }

  /** Settlement sending pool shares to `to`. */
  private sendShares(to: ParticipantAddress, shares: bigint): Settlement {
    return async () => {
      const sent = await this.deps.vault.transferShares(to, shares);
      if (sent !== shares) {
        this.reportShortfall("transferShares", to, shares, sent);
        throw new TransferFailedError(to, shares, sent);
      }
    };
  }

  // A partial move leaves shares the ledger does not track.
  private reportShortfall(
    operation: string,
    counterparty: ParticipantAddress,
    requested: bigint,
    reported: bigint
  ): void {
    if (reported === 0n) return;
    this.log.error(
      {
        operation,
        counterparty,
        requested: requested.toString(),
        reported: reported.toString(),
      },
      "vault moved a partial share count; commit rolled back"
    );
  }

  private requireRunning(pool: PoolState, operation: string): void {
    if (pool.paused) {
      throw new PoolSuspendedError(operation);
    }
  }

  private requireRole(role: PoolRole, actor: ParticipantAddress): void {
    if (!this.deps.access.hasRole(role, actor)) {
      throw new UnauthorizedError(actor, role);
    }
  }

  private now(): Date {
    return new Date(this.deps.clock.now());
  }
}
