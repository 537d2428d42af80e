// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/tests/fixtures`
 * Purpose: Shared env record and mock logger for keeper service tests.
 * Notes: Placeholder key only; never a funded account.
 * @internal
 */

import { vi } from "vitest";

import type { Logger } from "../src/observability/logger.js";

export const POOL_ID = "6f1c2a8e-4b7d-4e51-9a3c-2d8f0b6e7a91";

export const BASE_ENV: Record<string, string | undefined> = {
  POOL_ID,
  EVM_RPC_URL: "http://127.0.0.1:8545",
  CHAIN_ID: "17000",
  SHARES_TOKEN_ADDRESS: "0xace0000000000000000000000000000000000007",
  POOL_ADDRESS: "0x9001000000000000000000000000000000000006",
  POOL_OPERATOR_PRIVATE_KEY: `0x${"11".repeat(32)}`,
  INITIAL_DEPOSIT_CAP: "1000000000000000000000",
  ADMIN_ADDRESSES: "0xadd1e00000000000000000000000000000000004",
  PAUSE_OPERATOR_ADDRESSES:
    "0xfeed000000000000000000000000000000000005, 0xadd1e00000000000000000000000000000000004",
};

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return { logger, asLogger: logger as unknown as Logger };
}
