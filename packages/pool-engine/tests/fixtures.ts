// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine/tests/fixtures`
 * Purpose: Deterministic fakes and a pool factory for engine tests.
 * Scope: FakeRateVault (rational exchange rate, share balances, failure, short-transfer and callback hooks), FakeClock, named participants.
 * Invariants: Conversions round down like the on-chain token; transfers return 0n instead of throwing on insufficient balance.
 * Side-effects: none
 * @internal
 */

import { type ParticipantAddress, toParticipantAddress } from "@stakepool/ids";
import type { Clock, RateVault } from "@stakepool/pool-core";
import pino from "pino";

import {
  InMemoryPoolStore,
  StakingPool,
  StaticAccessPolicy,
} from "../src/index";

export const ALICE = toParticipantAddress(
  "0xa11ce00000000000000000000000000000000001"
);
export const BOB = toParticipantAddress(
  "0xb0b0000000000000000000000000000000000002"
);
export const ADMIN = toParticipantAddress(
  "0xadd1e00000000000000000000000000000000004"
);
export const OPERATOR = toParticipantAddress(
  "0xfeed000000000000000000000000000000000005"
);
export const POOL = toParticipantAddress(
  "0x9001000000000000000000000000000000000006"
);
export const TREASURY = toParticipantAddress(
  "0xace0000000000000000000000000000000000007"
);

export const START = "2026-01-05T12:00:00.000Z";

export class FakeClock implements Clock {
  private current: Date;

  constructor(initial: string = START) {
    this.current = new Date(initial);
  }

  now(): string {
    return this.current.toISOString();
  }

  advance(milliseconds: number): void {
    this.current = new Date(this.current.getTime() + milliseconds);
  }
}

export type TransferKind = "transferShares" | "transferSharesFrom";

/**
 * Share token with a settable value-per-share rate `num / den`.
 * value(s) = s * num / den; shares(v) = v * den / num.
 */
export class FakeRateVault implements RateVault {
  private num = 1n;
  private den = 1n;
  private readonly balances = new Map<ParticipantAddress, bigint>();

  /** When true every transfer reports 0n shares moved */
  public failTransfers = false;
  /** Moves at most this many shares per transfer and reports the count moved */
  public transferLimit: bigint | null = null;
  /** Runs inside each transfer before balances move */
  public onTransfer: ((kind: TransferKind) => Promise<void>) | null = null;

  constructor(private readonly poolAddress: ParticipantAddress) {}

  setRate(num: bigint, den: bigint): void {
    this.num = num;
    this.den = den;
  }

  mint(holder: ParticipantAddress, shares: bigint): void {
    this.balances.set(holder, this.balanceOf(holder) + shares);
  }

  balanceOf(holder: ParticipantAddress): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  async value(shares: bigint): Promise<bigint> {
    return (shares * this.num) / this.den;
  }

  async shares(value: bigint): Promise<bigint> {
    return (value * this.den) / this.num;
  }

  async transferShares(
    to: ParticipantAddress,
    shares: bigint
  ): Promise<bigint> {
    return this.move("transferShares", this.poolAddress, to, shares);
  }

  async transferSharesFrom(
    from: ParticipantAddress,
    to: ParticipantAddress,
    shares: bigint
  ): Promise<bigint> {
    return this.move("transferSharesFrom", from, to, shares);
  }

  private async move(
    kind: TransferKind,
    from: ParticipantAddress,
    to: ParticipantAddress,
    shares: bigint
  ): Promise<bigint> {
    if (this.onTransfer) {
      await this.onTransfer(kind);
    }
    if (this.failTransfers || this.balanceOf(from) < shares) {
      return 0n;
    }
    const moved =
      this.transferLimit !== null && this.transferLimit < shares
        ? this.transferLimit
        : shares;
    this.balances.set(from, this.balanceOf(from) - moved);
    this.balances.set(to, this.balanceOf(to) + moved);
    return moved;
  }
}

export interface PoolHarness {
  readonly pool: StakingPool;
  readonly store: InMemoryPoolStore;
  readonly vault: FakeRateVault;
  readonly clock: FakeClock;
}

export const DEFAULT_CAP = 1_000_000n;

/** Pool at a 1:1 rate; ALICE and BOB each hold 1000 shares in the vault. */
export function createPool(
  options: { depositCap?: bigint } = {}
): PoolHarness {
  const store = new InMemoryPoolStore();
  const vault = new FakeRateVault(POOL);
  const clock = new FakeClock();
  vault.mint(ALICE, 1000n);
  vault.mint(BOB, 1000n);

  const pool = new StakingPool({
    store,
    vault,
    clock,
    access: new StaticAccessPolicy({
      admin: [ADMIN],
      "pause-operator": [OPERATOR],
    }),
    logger: pino({ enabled: false }),
    poolAddress: POOL,
    initialDepositCap: options.depositCap ?? DEFAULT_CAP,
  });

  return { pool, store, vault, clock };
}
