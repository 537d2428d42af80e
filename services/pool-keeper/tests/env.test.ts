// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/tests/env`
 * Purpose: Environment validation: defaults, address checksumming, bigint parsing, error listing.
 * @internal
 */

import { describe, expect, it } from "vitest";

import { parseEnv } from "../src/bootstrap/env.js";
import { BASE_ENV } from "./fixtures.js";

describe("parseEnv", () => {
  it("parses a complete environment with defaults", () => {
    const config = parseEnv(BASE_ENV);

    expect(config).toMatchObject({
      CHAIN_ID: 17000,
      SHARES_TOKEN_ADDRESS: "0xace0000000000000000000000000000000000007",
      POOL_ADDRESS: "0x9001000000000000000000000000000000000006",
      INITIAL_DEPOSIT_CAP: 1_000_000_000_000_000_000_000n,
      ADMIN_ADDRESSES: ["0xaDD1E00000000000000000000000000000000004"],
      PAUSE_OPERATOR_ADDRESSES: [
        "0xfEeD000000000000000000000000000000000005",
        "0xaDD1E00000000000000000000000000000000004",
      ],
      REWARD_INTERVAL_MS: 3_600_000,
      LOG_LEVEL: "info",
      SERVICE_NAME: "pool-keeper",
      HEALTH_PORT: 9000,
    });
    expect(config.DATABASE_URL).toBeUndefined();
  });

  it("treats an empty DATABASE_URL as unset", () => {
    expect(parseEnv({ ...BASE_ENV, DATABASE_URL: "" }).DATABASE_URL).toBe(
      undefined
    );
    expect(
      parseEnv({ ...BASE_ENV, DATABASE_URL: "postgres://localhost/pool" })
        .DATABASE_URL
    ).toBe("postgres://localhost/pool");
  });

  it("defaults role lists to empty", () => {
    const config = parseEnv({
      ...BASE_ENV,
      ADMIN_ADDRESSES: undefined,
      PAUSE_OPERATOR_ADDRESSES: undefined,
    });
    expect(config.ADMIN_ADDRESSES).toEqual([]);
    expect(config.PAUSE_OPERATOR_ADDRESSES).toEqual([]);
  });

  it("lists every invalid variable", () => {
    expect(() =>
      parseEnv({ ...BASE_ENV, POOL_ID: undefined, CHAIN_ID: "5" })
    ).toThrow(
      "Invalid environment configuration:\n" +
        "  POOL_ID: Required\n" +
        "  CHAIN_ID: CHAIN_ID must be one of 1, 17000, 11155111"
    );
  });

  it("rejects malformed secrets and amounts", () => {
    expect(() =>
      parseEnv({ ...BASE_ENV, POOL_OPERATOR_PRIVATE_KEY: "0x1234" })
    ).toThrow(
      "POOL_OPERATOR_PRIVATE_KEY: POOL_OPERATOR_PRIVATE_KEY must be 32 bytes of 0x-prefixed hex"
    );
    expect(() => parseEnv({ ...BASE_ENV, INITIAL_DEPOSIT_CAP: "-1" })).toThrow(
      "INITIAL_DEPOSIT_CAP: INITIAL_DEPOSIT_CAP must be an unsigned integer"
    );
  });

  it("rejects malformed addresses", () => {
    expect(() => parseEnv({ ...BASE_ENV, ADMIN_ADDRESSES: "alice" })).toThrow(
      "ADMIN_ADDRESSES: Invalid participant address: alice"
    );
    expect(() => parseEnv({ ...BASE_ENV, POOL_ADDRESS: "0x12" })).toThrow(
      "POOL_ADDRESS: Invalid participant address: 0x12"
    );
  });
});
