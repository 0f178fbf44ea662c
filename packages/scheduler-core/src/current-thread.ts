// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/current-thread`
 * Purpose: Trampolining scheduler — runs work on the calling thread, deferring re-entrant requests until the running action returns.
 * Scope: Per-thread activation registry plus the drain loop. Does not hand work to other threads.
 * Invariants:
 * - At most one activation (Schedule) per threadId; it exists only while the outermost call is draining
 * - The activation is torn down in `finally`, also when an action throws
 * - Re-entrant calls only enqueue and return
 * - Drain order is the Schedule's (due time, arrival) order; each entry sleeps on the clock of the scheduler that enqueued it
 * Side-effects: Blocks the calling thread between entries (via Clock.sleep)
 * @public
 */

import { threadId } from "node:worker_threads";

import type { Closeable } from "./closeable";
import { type Action, Schedule } from "./schedule";
import { AbstractScheduler } from "./scheduler";
import { between, type Clock, type Instant, systemClock } from "./time";

/** Open activations keyed by the thread that owns them. */
const activations = new Map<number, Schedule>();

function drain(schedule: Schedule): void {
  for (
    let next = schedule.dequeue();
    next !== undefined;
    next = schedule.dequeue()
  ) {
    next.action();
  }
}

function runWithSchedule(work: (schedule: Schedule) => Closeable): Closeable {
  const active = activations.get(threadId);
  if (active !== undefined) {
    return work(active);
  }

  const schedule = new Schedule();
  activations.set(threadId, schedule);
  try {
    const result = work(schedule);
    drain(schedule);
    return result;
  } finally {
    activations.delete(threadId);
  }
}

/** Whether the calling thread is currently inside a current-thread drain. */
export function isTrampolineActive(): boolean {
  return activations.has(threadId);
}

/**
 * Run `work` with an activation open, so anything it schedules on a
 * CurrentThreadScheduler runs after `work` returns rather than inline.
 */
export function runTrampolined(work: () => Closeable): Closeable {
  return runWithSchedule(() => work());
}

export class CurrentThreadScheduler extends AbstractScheduler {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  now(): Instant {
    return this.clock.now();
  }

  /** Each entry waits on its own scheduler's clock, whoever opened the activation. */
  scheduleAt(at: Instant, action: Action): Closeable {
    return runWithSchedule((schedule) =>
      schedule.enqueue(at, () => {
        this.clock.sleep(between(this.clock.now(), at));
        action();
      })
    );
  }
}
