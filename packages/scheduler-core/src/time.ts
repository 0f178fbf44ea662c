// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/time`
 * Purpose: Branded Instant/Duration value types, arithmetic, and the Clock port.
 * Scope: Millisecond time values and wall-clock sampling. Does not schedule anything.
 * Invariants:
 * - instant()/duration() are the only entry points that brand a raw number
 * - Branded values are always finite
 * - systemClock.sleep() blocks the calling thread; it never yields to the event loop
 * Side-effects: systemClock reads Date.now() and blocks via Atomics.wait
 * @public
 */

import type { Tagged } from "type-fest";

import { InvalidTimeError } from "./errors";

/** Point in time, epoch milliseconds. */
export type Instant = Tagged<number, "Instant">;

/** Signed span between two instants, milliseconds. */
export type Duration = Tagged<number, "Duration">;

/** Validate and brand a raw epoch-millisecond value. */
export function instant(epochMillis: number): Instant {
  if (!Number.isFinite(epochMillis)) {
    throw new InvalidTimeError("instant", epochMillis);
  }
  return epochMillis as Instant;
}

/** Validate and brand a raw millisecond span. */
export function duration(millis: number): Duration {
  if (!Number.isFinite(millis)) {
    throw new InvalidTimeError("duration", millis);
  }
  return millis as Duration;
}

export const EPOCH: Instant = instant(0);

/** Smallest representable step between two instants. */
export const ONE_TICK: Duration = duration(1);

export const ZERO: Duration = duration(0);

export function plus(at: Instant, delay: Duration): Instant {
  return instant(at + delay);
}

export function between(from: Instant, to: Instant): Duration {
  return duration(to - from);
}

export function isBefore(a: Instant, b: Instant): boolean {
  return a < b;
}

export function isAfter(a: Instant, b: Instant): boolean {
  return a > b;
}

export function latest(a: Instant, b: Instant): Instant {
  return a >= b ? a : b;
}

export function wallClock(): Instant {
  return instant(Date.now());
}

/**
 * Source of "now" plus a blocking sleep.
 * Real-time schedulers take one so tests can substitute a fake.
 */
export interface Clock {
  now(): Instant;
  sleep(delay: Duration): void;
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

export const systemClock: Clock = {
  now: wallClock,
  sleep(delay: Duration): void {
    if (delay > 0) {
      Atomics.wait(sleepCell, 0, 0, delay);
    }
  },
};
