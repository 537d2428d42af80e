// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine/tests/pool-lock`
 * Purpose: Serialization and re-entrancy rejection, on the lock alone and through the engine.
 * Side-effects: none
 * @internal
 */

import { ReentrantCallError } from "@stakepool/pool-core";
import { describe, expect, it } from "vitest";

import { PoolLock } from "../src/index";
import { ALICE, BOB, createPool } from "./fixtures";

describe("PoolLock", () => {
  it("runs sections one at a time in call order", async () => {
    const lock = new PoolLock();
    const trace: string[] = [];

    const section = (name: string) => async () => {
      trace.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      trace.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run("a", section("a")),
      lock.run("b", section("b")),
    ]);

    expect(results).toEqual(["a", "b"]);
    expect(trace).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("rejects a nested run instead of deadlocking", async () => {
    const lock = new PoolLock();

    const nested = await lock.run("outer", async () => {
      expect(lock.activeOperation()).toBe("outer");
      return lock.run("inner", async () => "unreachable").catch(
        (error: unknown) => error
      );
    });

    expect(nested).toBeInstanceOf(ReentrantCallError);
    expect(nested).toMatchObject({
      operation: "inner",
      activeOperation: "outer",
    });
    expect(lock.activeOperation()).toBeUndefined();
  });

  it("releases the lock after a failed section", async () => {
    const lock = new PoolLock();

    await expect(
      lock.run("boom", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.run("next", async () => 42)).resolves.toBe(42);
  });
});

describe("StakingPool under concurrency", () => {
  it("serializes concurrent deposits without losing updates", async () => {
    const { pool } = createPool();

    await Promise.all([pool.deposit(ALICE, 100n), pool.deposit(BOB, 100n)]);

    expect(await pool.getPool()).toMatchObject({
      totalShares: 200n,
      accumulatedScaledBalance: 200n,
      poolValue: 200n,
    });
  });

  it("rejects a deposit made from inside a vault callback", async () => {
    const { pool, vault } = createPool();
    let inner: unknown = null;
    vault.onTransfer = async () => {
      vault.onTransfer = null;
      inner = await pool.deposit(BOB, 10n).catch((error: unknown) => error);
    };

    await expect(pool.deposit(ALICE, 100n)).resolves.toBe(100n);

    expect(inner).toBeInstanceOf(ReentrantCallError);
    expect(inner).toMatchObject({
      operation: "deposit",
      activeOperation: "deposit",
    });
    expect(await pool.getAccount(BOB)).toEqual({
      scaledBalance: 0n,
      shares: 0n,
    });
  });

  it("keeps serving after an operation fails", async () => {
    const { pool, vault } = createPool();
    vault.failTransfers = true;
    await expect(pool.deposit(ALICE, 100n)).rejects.toMatchObject({
      code: "DEPOSIT_FAILED",
    });

    vault.failTransfers = false;
    await expect(pool.deposit(ALICE, 100n)).resolves.toBe(100n);
  });
});
