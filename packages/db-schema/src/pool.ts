// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-schema/pool`
 * Purpose: Staking pool ledger schema: pool aggregates, participant accounts, append-only event log.
 * Scope: Table definitions only. Does not contain queries, business logic, or I/O.
 * Invariants:
 * - Share/value/scaled columns are NUMERIC(78,0) so any uint256 fits (ALL_MATH_BIGINT); drivers return them as decimal strings.
 * - POOL_SCOPED: every table is keyed by pool_id.
 * - Accounts are never deleted; an exited participant is a zeroed row.
 * - pool_events is append-only; id order is commit order.
 * Side-effects: none (schema definitions only)
 * Links: docs/pool-accounting.md#persistence
 * @public
 */

import { sql } from "drizzle-orm";
import {
  bigserial,
  boolean,
  check,
  index,
  jsonb,
  numeric,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

const uint256 = (name: string) =>
  numeric(name, { precision: 78, scale: 0 }).notNull().default("0");

/** One row per pool. */
export const poolState = pgTable(
  "pool_state",
  {
    poolId: uuid("pool_id").primaryKey(),
    totalShares: uint256("total_shares"),
    treasuryShares: uint256("treasury_shares"),
    poolValue: uint256("pool_value"),
    accumulatedScaledBalance: uint256("accumulated_scaled_balance"),
    depositCap: uint256("deposit_cap"),
    paused: boolean("paused").notNull().default(false),
    lastRewardAt: timestamp("last_reward_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    check(
      "pool_state_non_negative",
      sql`${table.totalShares} >= 0 AND ${table.treasuryShares} >= 0 AND ${table.poolValue} >= 0 AND ${table.accumulatedScaledBalance} >= 0`
    ),
  ]
);

/** Per-participant claim. Address stored EIP-55 checksummed. */
export const poolAccounts = pgTable(
  "pool_accounts",
  {
    poolId: uuid("pool_id")
      .notNull()
      .references(() => poolState.poolId, { onDelete: "cascade" }),
    address: text("address").notNull(),
    scaledBalance: uint256("scaled_balance"),
    shares: uint256("shares"),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.poolId, table.address] }),
    check(
      "pool_accounts_address_format",
      sql`${table.address} ~ '^0x[0-9a-fA-F]{40}$'`
    ),
  ]
);

/**
 * Event log. `payload` holds the JSON wire form; `type` and `participant`
 * are denormalized for filtering.
 */
export const poolEvents = pgTable(
  "pool_events",
  {
    id: bigserial("id", { mode: "bigint" }).primaryKey(),
    poolId: uuid("pool_id")
      .notNull()
      .references(() => poolState.poolId, { onDelete: "cascade" }),
    type: text("type").notNull(),
    participant: text("participant"),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
    occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("pool_events_pool_id_idx").on(table.poolId, table.id),
    index("pool_events_participant_idx").on(table.poolId, table.participant),
  ]
);
