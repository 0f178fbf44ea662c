// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/tests/virtual.test`
 * Purpose: Unit tests for the virtual-time scheduler.
 * Scope: Drain order, clock movement, exclusive runTo, cancellation, recursion.
 * Invariants:
 *   - Clock never moves backwards
 *   - runTo(t) leaves entries due at t pending
 * Side-effects: none
 * Links: packages/scheduler-core/src/virtual.ts
 * @internal
 */

import { beforeEach, describe, expect, it } from "vitest";

import { plus } from "../src/time";
import { VirtualScheduler } from "../src/virtual";
import { at, INITIAL, ms } from "./fixtures";

describe("VirtualScheduler", () => {
  let scheduler: VirtualScheduler;
  let count: number;

  /** Counts a run and checks the clock reads `expected` while it runs. */
  const action =
    (expected = INITIAL): (() => void) =>
    () => {
      expect(scheduler.now()).toBe(expected);
      count += 1;
    };

  beforeEach(() => {
    scheduler = new VirtualScheduler(INITIAL);
    count = 0;
  });

  it("defaults the clock to instant 100", () => {
    expect(new VirtualScheduler().now()).toBe(100);
  });

  it("does not run an action when it is scheduled", () => {
    scheduler.schedule(action());

    expect(count).toBe(0);
    expect(scheduler.pendingCount).toBe(1);
  });

  it("runs a scheduled action once without moving the clock", () => {
    scheduler.schedule(action());

    scheduler.run();

    expect(count).toBe(1);
    expect(scheduler.now()).toBe(100);
    expect(scheduler.pendingCount).toBe(0);
  });

  it("runs a delayed action at its due time", () => {
    scheduler.scheduleAfter(ms(1000), action(at(1100)));

    scheduler.run();

    expect(count).toBe(1);
    expect(scheduler.now()).toBe(1100);
  });

  it("never takes the clock backwards", () => {
    scheduler.scheduleAt(at(-900), action(INITIAL));

    scheduler.run();

    expect(count).toBe(1);
    expect(scheduler.now()).toBe(100);
  });

  it("runs actions in due-time order", () => {
    const order: string[] = [];
    scheduler.scheduleAfter(ms(2000), () => {
      action(at(2100))();
      order.push("A");
    });
    scheduler.scheduleAfter(ms(1000), () => {
      action(at(1100))();
      order.push("B");
    });

    scheduler.run();

    expect(order).toEqual(["B", "A"]);
    expect(count).toBe(2);
    expect(scheduler.now()).toBe(2100);
  });

  it("runs actions scheduled by other actions in the same drain", () => {
    scheduler.schedule(() => {
      scheduler.scheduleAfter(ms(1000), action(at(1100)));
    });

    scheduler.run();

    expect(count).toBe(1);
    expect(scheduler.now()).toBe(1100);
  });

  it("keeps the clock when a running action schedules into the past", () => {
    const seen: number[] = [];
    scheduler.scheduleAfter(ms(500), () => {
      scheduler.scheduleAt(at(0), () => seen.push(scheduler.now()));
    });

    scheduler.run();

    expect(seen).toEqual([600]);
    expect(scheduler.now()).toBe(600);
  });

  it("runs up to the specified instant, exclusive", () => {
    scheduler.scheduleAfter(ms(1000), action(at(1100)));

    scheduler.runTo(plus(INITIAL, ms(1000)));

    expect(count).toBe(0);
    expect(scheduler.now()).toBe(1100);
    expect(scheduler.pendingCount).toBe(1);
  });

  it("does not run actions after the specified instant", () => {
    scheduler.scheduleAfter(ms(2000), action(at(2100)));
    scheduler.scheduleAfter(ms(1000), action(at(1100)));

    scheduler.runTo(plus(INITIAL, ms(1500)));

    expect(count).toBe(1);
    expect(scheduler.now()).toBe(1600);
  });

  it("moves the clock to the target even when nothing is due", () => {
    scheduler.runTo(at(750));

    expect(scheduler.now()).toBe(750);
  });

  it("does not move the clock backwards on runTo an earlier instant", () => {
    scheduler.runTo(at(750));
    scheduler.runTo(at(300));

    expect(scheduler.now()).toBe(750);
  });

  it("does not run actions that have been cancelled", () => {
    const subscription = scheduler.scheduleAfter(ms(2000), action(at(2100)));
    scheduler.scheduleAfter(ms(1000), () => {
      subscription.close();
      action(at(1100))();
    });

    scheduler.run();

    expect(count).toBe(1);
    expect(scheduler.now()).toBe(1100);
  });

  it("does not cancel or re-run actions that have already run", () => {
    const subscription = scheduler.scheduleAfter(ms(1000), action(at(1100)));
    scheduler.scheduleAfter(ms(2000), () => {
      subscription.close();
      action(at(2100))();
    });

    scheduler.run();

    expect(count).toBe(2);
    expect(scheduler.now()).toBe(2100);
  });

  it("schedules a recursive action", () => {
    let runs = 0;
    scheduler.scheduleRecursive((again) => {
      runs += 1;
      if (runs < 2) {
        again();
      }
    });

    scheduler.run();

    expect(runs).toBe(2);
  });

  it("propagates action errors to the caller of run and keeps later work", () => {
    const ran: string[] = [];
    scheduler.scheduleAfter(ms(10), () => {
      throw new Error("boom");
    });
    scheduler.scheduleAfter(ms(20), () => ran.push("later"));

    expect(() => scheduler.run()).toThrow("boom");
    expect(scheduler.now()).toBe(110);

    scheduler.run();
    expect(ran).toEqual(["later"]);
  });
});
