// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/events`
 * Purpose: Pool event union and its JSON wire form for indexers and the event log.
 * Scope: Types, serializer and zod-validated parser. Does not publish or persist events.
 * Invariants:
 * - Events carry the literal amounts an operation computed, never re-derived values.
 * - Wire form encodes bigint as decimal strings and dates as ISO 8601.
 * Side-effects: none
 * Links: docs/pool-accounting.md#events
 * @public
 */

import { type ParticipantAddress, toParticipantAddress } from "@stakepool/ids";
import { z } from "zod";

export const POOL_EVENT_TYPES = [
  "deposit",
  "withdrawal",
  "emergency-withdrawal",
  "reward-assignment",
  "deposit-cap-updated",
  "paused",
  "unpaused",
  "treasury-withdrawal",
] as const;
export type PoolEventType = (typeof POOL_EVENT_TYPES)[number];

interface ParticipantTransfer {
  readonly user: ParticipantAddress;
  /** Value units actually credited or paid out */
  readonly amount: bigint;
  readonly shares: bigint;
  readonly at: Date;
}

export interface DepositEvent extends ParticipantTransfer {
  readonly type: "deposit";
}

export interface WithdrawalEvent extends ParticipantTransfer {
  readonly type: "withdrawal";
}

export interface EmergencyWithdrawalEvent extends ParticipantTransfer {
  readonly type: "emergency-withdrawal";
}

export interface RewardAssignmentEvent {
  readonly type: "reward-assignment";
  readonly sharesYield: bigint;
  /** totalShares after the skim */
  readonly totalShares: bigint;
  readonly at: Date;
}

export interface DepositCapUpdatedEvent {
  readonly type: "deposit-cap-updated";
  readonly previousCap: bigint;
  readonly newCap: bigint;
  readonly at: Date;
}

export interface PausedEvent {
  readonly type: "paused";
  readonly by: ParticipantAddress;
  readonly at: Date;
}

export interface UnpausedEvent {
  readonly type: "unpaused";
  readonly by: ParticipantAddress;
  readonly at: Date;
}

export interface TreasuryWithdrawalEvent {
  readonly type: "treasury-withdrawal";
  readonly destination: ParticipantAddress;
  readonly amount: bigint;
  readonly shares: bigint;
  readonly at: Date;
}

export type PoolEvent =
  | DepositEvent
  | WithdrawalEvent
  | EmergencyWithdrawalEvent
  | RewardAssignmentEvent
  | DepositCapUpdatedEvent
  | PausedEvent
  | UnpausedEvent
  | TreasuryWithdrawalEvent;

type Wire<E> = {
  [K in keyof E]: E[K] extends bigint | Date ? string : E[K];
};

/** JSON-safe form of a PoolEvent */
export type SerializedPoolEvent = PoolEvent extends infer E
  ? E extends PoolEvent
    ? Wire<E>
    : never
  : never;

/** Address an event is attributed to, if any (used as an index column). */
export function eventParticipant(event: PoolEvent): ParticipantAddress | null {
  switch (event.type) {
    case "deposit":
    case "withdrawal":
    case "emergency-withdrawal":
      return event.user;
    case "paused":
    case "unpaused":
      return event.by;
    case "treasury-withdrawal":
      return event.destination;
    case "reward-assignment":
    case "deposit-cap-updated":
      return null;
  }
}

export function serializePoolEvent(event: PoolEvent): SerializedPoolEvent {
  const at = event.at.toISOString();
  switch (event.type) {
    case "deposit":
    case "withdrawal":
    case "emergency-withdrawal":
      return {
        type: event.type,
        user: event.user,
        amount: event.amount.toString(),
        shares: event.shares.toString(),
        at,
      };
    case "reward-assignment":
      return {
        type: event.type,
        sharesYield: event.sharesYield.toString(),
        totalShares: event.totalShares.toString(),
        at,
      };
    case "deposit-cap-updated":
      return {
        type: event.type,
        previousCap: event.previousCap.toString(),
        newCap: event.newCap.toString(),
        at,
      };
    case "paused":
    case "unpaused":
      return { type: event.type, by: event.by, at };
    case "treasury-withdrawal":
      return {
        type: event.type,
        destination: event.destination,
        amount: event.amount.toString(),
        shares: event.shares.toString(),
        at,
      };
  }
}

// ---------------------------------------------------------------------------
// Wire schema
// ---------------------------------------------------------------------------

const uint = z
  .string()
  .regex(/^\d+$/, "expected an unsigned decimal integer")
  .transform((value) => BigInt(value));

const address = z.string().transform((value, ctx): ParticipantAddress => {
  try {
    return toParticipantAddress(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const transferFields = {
  user: address,
  amount: uint,
  shares: uint,
  at: timestamp,
};

const PoolEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("deposit"), ...transferFields }),
  z.object({ type: z.literal("withdrawal"), ...transferFields }),
  z.object({ type: z.literal("emergency-withdrawal"), ...transferFields }),
  z.object({
    type: z.literal("reward-assignment"),
    sharesYield: uint,
    totalShares: uint,
    at: timestamp,
  }),
  z.object({
    type: z.literal("deposit-cap-updated"),
    previousCap: uint,
    newCap: uint,
    at: timestamp,
  }),
  z.object({ type: z.literal("paused"), by: address, at: timestamp }),
  z.object({ type: z.literal("unpaused"), by: address, at: timestamp }),
  z.object({
    type: z.literal("treasury-withdrawal"),
    destination: address,
    amount: uint,
    shares: uint,
    at: timestamp,
  }),
]);

/**
 * Decode a wire event. Throws ZodError on malformed input.
 */
export function parsePoolEvent(raw: unknown): PoolEvent {
  return PoolEventSchema.parse(raw);
}
