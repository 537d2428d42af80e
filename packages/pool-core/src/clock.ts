// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/clock`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Provides current time in ISO format. Does not handle timezone conversion or date arithmetic.
 * Invariants: Always returns ISO 8601 string format
 * Side-effects: none (interface only)
 * @public
 */

export interface Clock {
  now(): string;
}

export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }
}
