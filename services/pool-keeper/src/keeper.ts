// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-keeper/keeper`
 * Purpose: Periodic reward assignment so yield is skimmed even when nobody deposits or withdraws.
 * Scope: Interval loop around StakingPool.assignRewards. Does not retry within a tick.
 * Invariants:
 *   - At most one tick in flight; an overlapping interval is skipped
 *   - A suspended pool is skipped, not treated as an error
 *   - A failed tick is logged and the loop keeps running
 *   - status() reports the last outcome and the run of consecutive failures (read by /readyz)
 * Side-effects: IO (timers, pool operations, logging)
 * @public
 */

import type { StakingPool } from "@stakepool/pool-engine";

import type { Logger } from "./observability/logger.js";

export type RewardTarget = Pick<StakingPool, "getPool" | "assignRewards">;

export type TickOutcome = "assigned" | "idle" | "suspended" | "failed";

export interface KeeperStatus {
  readonly lastOutcome: TickOutcome | null;
  /** ISO-8601 time the last tick settled */
  readonly lastTickAt: string | null;
  readonly consecutiveFailures: number;
}

export interface RewardKeeperDeps {
  readonly pool: RewardTarget;
  readonly intervalMs: number;
  readonly logger: Logger;
}

export class RewardKeeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<TickOutcome> | null = null;
  private current: KeeperStatus = {
    lastOutcome: null,
    lastTickAt: null,
    consecutiveFailures: 0,
  };

  constructor(private readonly deps: RewardKeeperDeps) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.schedule(), this.deps.intervalMs);
    this.deps.logger.info(
      { intervalMs: this.deps.intervalMs },
      "reward keeper started"
    );
  }

  /** Stop the interval and wait for a running tick to settle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  status(): KeeperStatus {
    return this.current;
  }

  /** One reward assignment attempt. Never rejects. */
  async tick(): Promise<TickOutcome> {
    const outcome = await this.attempt();
    this.current = {
      lastOutcome: outcome,
      lastTickAt: new Date().toISOString(),
      consecutiveFailures:
        outcome === "failed" ? this.current.consecutiveFailures + 1 : 0,
    };
    return outcome;
  }

  private async attempt(): Promise<TickOutcome> {
    const { pool, logger } = this.deps;
    try {
      const state = await pool.getPool();
      if (state.paused) {
        logger.debug({}, "pool suspended; skipping reward assignment");
        return "suspended";
      }
      const reward = await pool.assignRewards();
      if (!reward) {
        logger.debug({}, "no yield to assign");
        return "idle";
      }
      logger.info(
        {
          sharesYield: reward.sharesYield.toString(),
          totalShares: reward.totalShares.toString(),
        },
        "rewards assigned"
      );
      return "assigned";
    } catch (err) {
      logger.error({ err }, "reward assignment failed");
      return "failed";
    }
  }

  private schedule(): void {
    if (this.inFlight) {
      this.deps.logger.warn({}, "previous reward tick still running; skipping");
      return;
    }
    this.inFlight = this.tick().finally(() => {
      this.inFlight = null;
    });
  }
}
