// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/tests/fixtures`
 * Purpose: Reusable test doubles for scheduler-core unit tests.
 * Scope: A manually driven Clock. Does not import from other packages.
 * Invariants: FakeClock.sleep advances time instead of blocking and records each requested delay.
 * Side-effects: none (pure functions)
 * @internal
 */

import {
  type Clock,
  type Duration,
  duration,
  type Instant,
  instant,
} from "../src/time";

/** Fixed virtual start used across virtual-time tests. */
export const INITIAL: Instant = instant(100);

export function ms(millis: number): Duration {
  return duration(millis);
}

export function at(millis: number): Instant {
  return instant(millis);
}

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): Instant {
    return instant(this.current);
  }

  sleep(delay: Duration): void {
    this.sleeps.push(delay);
    if (delay > 0) {
      this.current += delay;
    }
  }

  advance(millis: number): void {
    this.current += millis;
  }
}
