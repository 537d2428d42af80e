// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // Keeper config
  "POOL_OPERATOR_PRIVATE_KEY",
  "DATABASE_URL",
  "config.POOL_OPERATOR_PRIVATE_KEY",
  "config.DATABASE_URL",
  "connectionString",
  // Wallet/crypto
  "privateKey",
  "mnemonic",
  "seed",
];
