// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/ids`
 * Purpose: Branded participant address type for every ledger seam.
 * Scope: Type definitions and boundary constructors only. Does not perform I/O.
 * Invariants:
 * - toParticipantAddress() is the single entry point for creating a ParticipantAddress (validated, EIP-55 checksummed)
 * - Two spellings of the same address always brand to the same string, so account maps never split
 * - No `as ParticipantAddress` casts outside this module
 * Side-effects: none
 * Links: docs/pool-accounting.md
 * @public
 */

import type { Tagged } from "type-fest";
import { type Address, getAddress, isAddress, zeroAddress } from "viem";

/** Checksummed EVM address of a depositor, operator or treasury destination. */
export type ParticipantAddress = Tagged<Address, "ParticipantAddress">;

/** Validate, checksum and brand a raw address. Boundary constructor; call at edges only. */
export function toParticipantAddress(raw: string): ParticipantAddress {
  const trimmed = raw.trim();
  if (!isAddress(trimmed, { strict: false })) {
    throw new Error(`Invalid participant address: ${raw}`);
  }
  return getAddress(trimmed) as ParticipantAddress;
}

/** Parse a comma-separated address list, ignoring blanks. */
export function toParticipantAddresses(raw: string): ParticipantAddress[] {
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map(toParticipantAddress);
}

export function isZeroAddress(address: ParticipantAddress): boolean {
  const plain: Address = address;
  return plain === zeroAddress;
}

/** The zero address, branded. Never a valid depositor or destination. */
export const ZERO_PARTICIPANT: ParticipantAddress =
  toParticipantAddress(zeroAddress);
