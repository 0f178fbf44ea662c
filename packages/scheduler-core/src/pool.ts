// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/pool`
 * Purpose: Scheduler that hands actions to a shared delayed-execution service.
 * Scope: DelayedExecutor port, a timer-backed default executor, and the PoolScheduler adapter. Does not decide pool sizing or process lifecycle.
 * Invariants:
 * - Cancelling before a task starts removes it; cancelling a started task is a no-op
 * - Daemon executors never keep the process alive for pending work
 * - Task errors are not caught; they surface from the timer callback
 * - No ordering is promised between two pool tasks beyond the executor's own
 * Side-effects: IO (timers)
 * @public
 */

import { type Closeable, closeable } from "./closeable";
import { ExecutorShutdownError } from "./errors";
import type { Action } from "./schedule";
import { AbstractScheduler } from "./scheduler";
import {
  between,
  type Clock,
  type Duration,
  type Instant,
  systemClock,
  ZERO,
} from "./time";

/** Handle to one submitted task. */
export interface PendingTask {
  /** Best-effort: prevents the task if it has not started. */
  cancel(): void;
}

/** Delayed-execution service consumed by PoolScheduler. */
export interface DelayedExecutor {
  submit(task: Action, delay: Duration): PendingTask;
}

/** Largest delay a single Node timer honours (2^31 - 1 ms). */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface TimerPoolExecutorOptions {
  /** Unref timers so pending tasks do not hold the process open. Default true. */
  readonly daemon?: boolean;
}

/**
 * Default executor: runs tasks from Node's timer queue.
 * Delays beyond the timer maximum are chained across several timers.
 */
export class TimerPoolExecutor implements DelayedExecutor {
  private readonly daemon: boolean;
  private readonly pending = new Set<PendingTask>();
  private shutDown = false;

  constructor(options: TimerPoolExecutorOptions = {}) {
    this.daemon = options.daemon ?? true;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get isShutdown(): boolean {
    return this.shutDown;
  }

  submit(task: Action, delay: Duration): PendingTask {
    if (this.shutDown) {
      throw new ExecutorShutdownError();
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const handle: PendingTask = {
      cancel: () => {
        if (this.pending.delete(handle)) {
          clearTimeout(timer);
        }
      },
    };

    const arm = (remainingMs: number): void => {
      const waitMs = Math.min(Math.max(remainingMs, ZERO), MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remainingMs > MAX_TIMER_DELAY_MS) {
          arm(remainingMs - MAX_TIMER_DELAY_MS);
          return;
        }
        this.pending.delete(handle);
        task();
      }, waitMs);
      if (this.daemon) {
        timer.unref();
      }
    };

    this.pending.add(handle);
    arm(delay);
    return handle;
  }

  /** Cancel every pending task and refuse new ones. Running tasks finish. */
  shutdown(): void {
    this.shutDown = true;
    for (const task of [...this.pending]) {
      task.cancel();
    }
  }
}

export class PoolScheduler extends AbstractScheduler {
  constructor(
    private readonly executor: DelayedExecutor,
    private readonly clock: Clock = systemClock
  ) {
    super();
  }

  now(): Instant {
    return this.clock.now();
  }

  override scheduleAfter(delay: Duration, action: Action): Closeable {
    const task = this.executor.submit(action, delay);
    return closeable(() => task.cancel());
  }

  scheduleAt(at: Instant, action: Action): Closeable {
    return this.scheduleAfter(between(this.now(), at), action);
  }
}
