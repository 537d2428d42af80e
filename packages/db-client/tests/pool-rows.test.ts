// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-client/tests/pool-rows`
 * Purpose: Row mapping between domain types and pool_* table rows.
 * Scope: Pure mapper tests; no database.
 * @internal
 */

import { toParticipantAddress } from "@stakepool/ids";
import { parsePoolEvent } from "@stakepool/pool-core";
import { describe, expect, it } from "vitest";

import {
  toAccountRecord,
  toAccountValues,
  toEventValues,
  toPoolState,
  toPoolStateValues,
} from "../src/index";

const POOL_ID = "6f1c2a8e-4b7d-4e51-9a3c-2d8f0b6e7a91";
const AT = new Date("2026-02-10T08:00:00.000Z");
const UPDATED = new Date("2026-02-10T08:00:05.000Z");

describe("pool state rows", () => {
  it("reads NUMERIC strings as bigint", () => {
    expect(
      toPoolState({
        poolId: POOL_ID,
        totalShares: "115792089237316195423570985008687907853269984665640564039457584007913129639935",
        treasuryShares: "9",
        poolValue: "100",
        accumulatedScaledBalance: "100",
        depositCap: "1000000",
        paused: true,
        lastRewardAt: AT,
        updatedAt: UPDATED,
      })
    ).toEqual({
      totalShares: 2n ** 256n - 1n,
      treasuryShares: 9n,
      poolValue: 100n,
      accumulatedScaledBalance: 100n,
      depositCap: 1_000_000n,
      paused: true,
      lastRewardAt: AT,
    });
  });

  it("writes bigint as decimal strings", () => {
    expect(
      toPoolStateValues(POOL_ID, {
        totalShares: 91n,
        treasuryShares: 9n,
        poolValue: 100n,
        accumulatedScaledBalance: 100n,
        depositCap: 500n,
        paused: false,
        lastRewardAt: null,
      })
    ).toEqual({
      poolId: POOL_ID,
      totalShares: "91",
      treasuryShares: "9",
      poolValue: "100",
      accumulatedScaledBalance: "100",
      depositCap: "500",
      paused: false,
      lastRewardAt: null,
    });
  });
});

describe("account rows", () => {
  it("checksums stored addresses on read", () => {
    expect(
      toAccountRecord({
        poolId: POOL_ID,
        address: "0xadd1e00000000000000000000000000000000004",
        scaledBalance: "51",
        shares: "51",
        updatedAt: UPDATED,
      })
    ).toEqual({
      address: "0xaDD1E00000000000000000000000000000000004",
      scaledBalance: 51n,
      shares: 51n,
    });
  });

  it("rejects malformed stored addresses", () => {
    expect(() =>
      toAccountRecord({
        poolId: POOL_ID,
        address: "0x1234",
        scaledBalance: "1",
        shares: "1",
        updatedAt: UPDATED,
      })
    ).toThrow("Invalid participant address: 0x1234");
  });

  it("writes the account under the pool id", () => {
    const address = toParticipantAddress(
      "0xa11ce00000000000000000000000000000000001"
    );
    expect(
      toAccountValues(POOL_ID, { address, scaledBalance: 0n, shares: 0n })
    ).toEqual({
      poolId: POOL_ID,
      address: "0xa11ce00000000000000000000000000000000001",
      scaledBalance: "0",
      shares: "0",
    });
  });
});

describe("event rows", () => {
  it("denormalizes type and participant and stores a parseable payload", () => {
    const user = toParticipantAddress(
      "0xb0b0000000000000000000000000000000000002"
    );
    const values = toEventValues(POOL_ID, {
      type: "withdrawal",
      user,
      amount: 49n,
      shares: 45n,
      at: AT,
    });

    expect(values).toMatchObject({
      poolId: POOL_ID,
      type: "withdrawal",
      participant: user,
      occurredAt: AT,
    });
    expect(parsePoolEvent(values.payload)).toEqual({
      type: "withdrawal",
      user,
      amount: 49n,
      shares: 45n,
      at: AT,
    });
  });

  it("leaves pool-wide events without a participant", () => {
    expect(
      toEventValues(POOL_ID, {
        type: "reward-assignment",
        sharesYield: 9n,
        totalShares: 91n,
        at: AT,
      }).participant
    ).toBeNull();
  });
});
