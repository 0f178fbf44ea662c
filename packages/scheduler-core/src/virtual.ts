// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/virtual`
 * Purpose: Scheduler with a synthetic clock, advanced only by draining queued work.
 * Scope: Owns one Schedule. scheduleAt only enqueues; run()/runTo() execute. Never sleeps or reads the wall clock.
 * Invariants:
 * - The clock never moves backwards, even for entries due before it
 * - runTo(t) executes only entries due strictly before t, then leaves the clock at t (or later, if it already was)
 * - Work enqueued by a running action is visible to the same drain
 * Side-effects: none
 * @public
 */

import type { Closeable } from "./closeable";
import { type Action, Schedule, type ScheduledAction } from "./schedule";
import { AbstractScheduler } from "./scheduler";
import { type Instant, instant, latest } from "./time";

export class VirtualScheduler extends AbstractScheduler {
  private readonly queue = new Schedule();
  private current: Instant;

  constructor(initialNow: Instant = instant(100)) {
    super();
    this.current = initialNow;
  }

  now(): Instant {
    return this.current;
  }

  /** Entries still waiting to run. */
  get pendingCount(): number {
    return this.queue.size;
  }

  scheduleAt(at: Instant, action: Action): Closeable {
    return this.queue.enqueue(at, action);
  }

  /** Run until the queue is empty. */
  run(): void {
    for (
      let next = this.queue.dequeue();
      next !== undefined;
      next = this.queue.dequeue()
    ) {
      this.runScheduled(next);
    }
  }

  /** Run everything due strictly before `until`, then move the clock to it. */
  runTo(until: Instant): void {
    for (
      let next = this.queue.dequeueBefore(until);
      next !== undefined;
      next = this.queue.dequeueBefore(until)
    ) {
      this.runScheduled(next);
    }
    this.current = latest(this.current, until);
  }

  private runScheduled(scheduled: ScheduledAction): void {
    this.current = latest(this.current, scheduled.time);
    scheduled.action();
  }
}
