// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/db-client/client`
 * Purpose: Drizzle client factory with injected connection string.
 * Scope: Creates the postgres.js pool and Drizzle instance. Does not read from environment.
 * Invariants:
 *   - Connection string injected, never from process.env
 *   - Database type preserves drizzle's `$client` accessor so callers can end() the pool on shutdown
 * Side-effects: IO (database connections)
 * @public
 */

import * as schema from "@stakepool/db-schema";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export function createPoolDbClient(
  connectionString: string,
  applicationName = "stakepool_keeper"
) {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: applicationName,
    },
  });

  return drizzle(client, { schema });
}

/** Drizzle client including the postgres.js `$client` accessor. */
export type Database = ReturnType<typeof createPoolDbClient>;
