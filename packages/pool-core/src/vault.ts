// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/vault`
 * Purpose: Port for the external rebasing asset: share/value conversion and share transfers.
 * Scope: Interface only. Does not implement conversions or hold balances.
 * Invariants:
 * - value() is monotonic in shares; its rate may fall over time (principal loss).
 * - Transfers return the shares actually moved; 0n means the vault rejected the transfer.
 * Side-effects: none (interface definition only)
 * Notes: Adapters: ViemRateVault (on-chain shares token), FakeRateVault (tests).
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";

export interface RateVault {
  /** Value units currently backing `shares` */
  value(shares: bigint): Promise<bigint>;
  /** Shares currently worth `value` units */
  shares(value: bigint): Promise<bigint>;
  /** Send shares out of the ledger's holdings */
  transferShares(to: ParticipantAddress, shares: bigint): Promise<bigint>;
  /** Pull shares from a depositor into the ledger */
  transferSharesFrom(
    from: ParticipantAddress,
    to: ParticipantAddress,
    shares: bigint
  ): Promise<bigint>;
}
