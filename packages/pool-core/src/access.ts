// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-core/access`
 * Purpose: Role lookup port for administrative operations.
 * Scope: Interface only. Granting and revoking roles is outside the ledger.
 * Side-effects: none
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";

import type { PoolRole } from "./model";

export interface AccessPolicy {
  hasRole(role: PoolRole, actor: ParticipantAddress): boolean;
}
