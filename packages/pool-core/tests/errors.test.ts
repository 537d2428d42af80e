// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/tests/errors`
 * Purpose: Type guards over the pool error union.
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  hasPoolErrorCode,
  isPoolError,
  PoolSuspendedError,
  ZeroAmountError,
} from "../src/index";

describe("pool error guards", () => {
  it("recognises pool errors by class", () => {
    expect(isPoolError(new ZeroAmountError("deposit"))).toBe(true);
    expect(isPoolError(new Error("deposit: boom"))).toBe(false);
    expect(isPoolError({ code: "ZERO_AMOUNT" })).toBe(false);
  });

  it("narrows to a single code", () => {
    const error: unknown = new PoolSuspendedError("withdraw");

    expect(hasPoolErrorCode(error, "ZERO_AMOUNT")).toBe(false);
    if (!hasPoolErrorCode(error, "POOL_SUSPENDED")) {
      throw new Error("expected POOL_SUSPENDED");
    }
    expect(error.operation).toBe("withdraw");
    expect(error.name).toBe("PoolSuspendedError");
  });
});
