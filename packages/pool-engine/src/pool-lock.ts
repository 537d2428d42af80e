// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stakepool/pool-engine/pool-lock`
 * Purpose: Single mutual-exclusion lock per pool instance, with re-entrancy detection.
 * Scope: Serializes async critical sections. Does not know about pool state.
 * Invariants:
 *   - ONE_LOCK_PER_POOL: every mutating operation runs inside run(); sections never interleave
 *   - NON_REENTRANT: a call made from inside a running section (e.g. a vault callback) rejects with ReentrantCallError instead of deadlocking
 *   - A failed section releases the lock
 * Side-effects: none (AsyncLocalStorage marks the running section)
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";

import { ReentrantCallError } from "@stakepool/pool-core";

export class PoolLock {
  private tail: Promise<unknown> = Promise.resolve();
  private readonly section = new AsyncLocalStorage<string>();

  /**
   * Run `fn` once every previously queued section has settled.
   *
   * @param operation - Name recorded for re-entrancy errors
   */
  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const active = this.section.getStore();
    if (active !== undefined) {
      return Promise.reject(new ReentrantCallError(operation, active));
    }

    const result = this.tail.then(() => this.section.run(operation, fn));
    // Queue position only; the failure itself reaches the caller through `result`
    this.tail = result.catch(() => undefined);
    return result;
  }

  /** Name of the section running in the current async context, if any */
  activeOperation(): string | undefined {
    return this.section.getStore();
  }
}
