// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: drizzle-kit configuration for pool table migrations.
 * Scope: Migration generation only. Does not handle runtime database connections.
 * Invariants: Schema path is the db-schema package root; migrations land in drizzle/migrations
 * Side-effects: IO (file system operations during migration generation)
 * Links: Used by npm run db:generate and db:migrate
 * @public
 */

import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./packages/db-schema/src/pool.ts",
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "postgres://localhost:5432/stakepool",
  },
  verbose: true,
  strict: true,
});
