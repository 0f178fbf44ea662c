// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/immediate`
 * Purpose: Scheduler that runs every action synchronously on the caller's stack.
 * Scope: Delayed actions block the caller until due. Does not queue; nothing can be cancelled once requested.
 * Invariants: Returned tokens are NOOP_CLOSEABLE; the action has completed by the time the call returns.
 * Side-effects: Blocks the calling thread for positive delays (via Clock.sleep)
 * @public
 */

import { type Closeable, NOOP_CLOSEABLE } from "./closeable";
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

export class ImmediateScheduler extends AbstractScheduler {
  constructor(private readonly clock: Clock = systemClock) {
    super();
  }

  now(): Instant {
    return this.clock.now();
  }

  override schedule(action: Action): Closeable {
    action();
    return NOOP_CLOSEABLE;
  }

  override scheduleAfter(delay: Duration, action: Action): Closeable {
    if (delay > ZERO) {
      this.clock.sleep(delay);
    }
    return this.schedule(action);
  }

  scheduleAt(at: Instant, action: Action): Closeable {
    return this.scheduleAfter(between(this.now(), at), action);
  }
}
