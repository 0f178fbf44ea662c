// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/scheduler`
 * Purpose: The Scheduler contract and the strategy-independent operations derived from scheduleAt.
 * Scope: Interface plus abstract base. Concrete strategies supply now() and scheduleAt(); everything else derives from them.
 * Invariants:
 * - schedule(a) ≡ scheduleAt(now(), a); scheduleAfter(d, a) ≡ scheduleAt(now() + d, a)
 * - Recursive operations return one token that cancels whichever step is pending
 * - Action errors are never caught here
 * Side-effects: none
 * @public
 */

import type { Closeable } from "./closeable";
import { RecursiveChain } from "./recursive";
import type { Action } from "./schedule";
import { type Duration, type Instant, plus } from "./time";

export interface Scheduler {
  /**
   * This scheduler's notion of the current instant. Real-time strategies sample
   * the wall clock on each call; virtual ones return a stable synthetic value.
   */
  now(): Instant;

  /** Run `action` as soon as this strategy allows. */
  schedule(action: Action): Closeable;

  /** Run `action` at or soon after `at`. */
  scheduleAt(at: Instant, action: Action): Closeable;

  /** Run `action` after `delay`. */
  scheduleAfter(delay: Duration, action: Action): Closeable;

  /**
   * Run `action` once; each call to the callback it receives schedules one more
   * run. The returned token cancels the pending run and stops the recursion.
   */
  scheduleRecursive(action: (again: () => void) => void): Closeable;

  /**
   * As scheduleRecursive, first run after `initialDelay`; each callback call
   * names the delay before the next run.
   */
  scheduleRecursiveAfter(
    initialDelay: Duration,
    action: (againAfter: (delay: Duration) => void) => void
  ): Closeable;
}

export abstract class AbstractScheduler implements Scheduler {
  abstract now(): Instant;

  abstract scheduleAt(at: Instant, action: Action): Closeable;

  schedule(action: Action): Closeable {
    return this.scheduleAt(this.now(), action);
  }

  scheduleAfter(delay: Duration, action: Action): Closeable {
    return this.scheduleAt(plus(this.now(), delay), action);
  }

  scheduleRecursive(action: (again: () => void) => void): Closeable {
    const chain = new RecursiveChain<[]>(
      (_args, step) => this.schedule(step),
      action
    );
    chain.continueWith();
    return chain;
  }

  scheduleRecursiveAfter(
    initialDelay: Duration,
    action: (againAfter: (delay: Duration) => void) => void
  ): Closeable {
    const chain = new RecursiveChain<[Duration]>(
      ([delay], step) => this.scheduleAfter(delay, step),
      action
    );
    chain.continueWith(initialDelay);
    return chain;
  }
}
