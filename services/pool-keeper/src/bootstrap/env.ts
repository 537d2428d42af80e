// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction, no side-effects beyond process.env read.
 * Invariants:
 * - DATABASE_URL optional; unset means the in-memory pool store
 * - POOL_OPERATOR_PRIVATE_KEY is a secret (never log; listed in REDACT_PATHS)
 * - Addresses are validated and checksummed at parse time
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: docs/pool-accounting.md#configuration
 * @internal
 */

import {
  type ParticipantAddress,
  toParticipantAddress,
  toParticipantAddresses,
} from "@stakepool/ids";
import { type Hex, isHex } from "viem";
import { z } from "zod";

import { SUPPORTED_CHAIN_IDS } from "../adapters/chains.js";

function issueMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const address = z.string().transform((value, ctx): ParticipantAddress => {
  try {
    return toParticipantAddress(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issueMessage(error) });
    return z.NEVER;
  }
});

const addressList = z
  .string()
  .default("")
  .transform((value, ctx): ParticipantAddress[] => {
    try {
      return toParticipantAddresses(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: issueMessage(error),
      });
      return z.NEVER;
    }
  });

const privateKey = z.string().transform((value, ctx): Hex => {
  if (isHex(value, { strict: true }) && value.length === 66) {
    return value;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: "POOL_OPERATOR_PRIVATE_KEY must be 32 bytes of 0x-prefixed hex",
  });
  return z.NEVER;
});

const EnvSchema = z.object({
  /** PostgreSQL connection string (optional; in-memory store when unset) */
  DATABASE_URL: z
    .string()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),

  /** Pool identity UUID; scopes all pool_* rows */
  POOL_ID: z.string().uuid("POOL_ID must be a valid UUID"),

  /** JSON-RPC endpoint of the chain hosting the shares token */
  EVM_RPC_URL: z.string().url("EVM_RPC_URL must be a valid URL"),

  CHAIN_ID: z.coerce
    .number()
    .int()
    .refine((id) => SUPPORTED_CHAIN_IDS.includes(id), {
      message: `CHAIN_ID must be one of ${SUPPORTED_CHAIN_IDS.join(", ")}`,
    }),

  /** Rebasing token exposing the shares interface */
  SHARES_TOKEN_ADDRESS: address,

  /** Address holding the pool's shares (the operator account) */
  POOL_ADDRESS: address,

  /** Operator key signing share transfers (required, treat as secret - never log) */
  POOL_OPERATOR_PRIVATE_KEY: privateKey,

  /** depositCap for a pool with no stored state, in value units (wei) */
  INITIAL_DEPOSIT_CAP: z
    .string()
    .regex(/^\d+$/, "INITIAL_DEPOSIT_CAP must be an unsigned integer")
    .transform((value) => BigInt(value)),

  /** Comma-separated addresses holding the admin role */
  ADMIN_ADDRESSES: addressList,

  /** Comma-separated addresses allowed to pause/unpause */
  PAUSE_OPERATOR_ADDRESSES: addressList,

  /** Reward assignment cadence (default: 1h) */
  REWARD_INTERVAL_MS: z.coerce.number().int().min(1000).default(3_600_000),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: pool-keeper) */
  SERVICE_NAME: z.string().default("pool-keeper"),

  /** Health endpoint port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate an environment record. Throws with one `path: message` line per issue.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
