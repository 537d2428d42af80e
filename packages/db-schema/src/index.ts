// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-schema`
 * Purpose: Root barrel re-exporting all schema slices; drizzle-kit and the db client read the full schema from here.
 * Scope: Re-exports only. Does not define any tables.
 * Side-effects: none
 * @public
 */

export * from "./pool";
