// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine/static-access-policy`
 * Purpose: AccessPolicy backed by fixed address lists (from env in the keeper service).
 * Scope: Role lookup only. Does not grant or revoke at runtime.
 * Side-effects: none
 * @public
 */

import type { ParticipantAddress } from "@stakepool/ids";
import {
  type AccessPolicy,
  POOL_ROLES,
  type PoolRole,
} from "@stakepool/pool-core";

export type RoleGrants = Partial<
  Record<PoolRole, readonly ParticipantAddress[]>
>;

export class StaticAccessPolicy implements AccessPolicy {
  private readonly grants: ReadonlyMap<PoolRole, ReadonlySet<ParticipantAddress>>;

  constructor(grants: RoleGrants) {
    this.grants = new Map(
      POOL_ROLES.map((role): [PoolRole, ReadonlySet<ParticipantAddress>] => [
        role,
        new Set(grants[role] ?? []),
      ])
    );
  }

  hasRole(role: PoolRole, actor: ParticipantAddress): boolean {
    return this.grants.get(role)?.has(actor) ?? false;
  }
}
