// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/tests/closeable.test`
 * Purpose: Unit tests for simple, composite and mutable cancellation tokens.
 * Scope: Token state transitions only.
 * Invariants:
 *   - close() is effective once
 *   - Additions after close are closed on arrival
 * Side-effects: none
 * Links: packages/scheduler-core/src/closeable.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  CompositeCloseable,
  closeable,
  MutableCloseable,
  NOOP_CLOSEABLE,
} from "../src/closeable";

describe("closeable", () => {
  it("runs the teardown exactly once", () => {
    const teardown = vi.fn();
    const token = closeable(teardown);

    token.close();
    token.close();

    expect(teardown).toHaveBeenCalledTimes(1);
  });

  it("NOOP_CLOSEABLE can be closed repeatedly", () => {
    expect(() => {
      NOOP_CLOSEABLE.close();
      NOOP_CLOSEABLE.close();
    }).not.toThrow();
  });
});

describe("CompositeCloseable", () => {
  it("closes every current child once", () => {
    const a = vi.fn();
    const b = vi.fn();
    const composite = new CompositeCloseable();
    composite.add(closeable(a));
    composite.add(closeable(b));

    composite.close();
    composite.close();

    expect(a).toHaveBeenCalledTimes(1);
    expect(b).toHaveBeenCalledTimes(1);
    expect(composite.isClosed).toBe(true);
    expect(composite.size).toBe(0);
  });

  it("closes a child added after close immediately", () => {
    const composite = new CompositeCloseable();
    composite.close();

    const late = vi.fn();
    composite.add(closeable(late));

    expect(late).toHaveBeenCalledTimes(1);
  });

  it("remove stops tracking without closing the child", () => {
    const teardown = vi.fn();
    const child = closeable(teardown);
    const composite = new CompositeCloseable();
    composite.add(child);

    composite.remove(child);
    composite.close();

    expect(teardown).not.toHaveBeenCalled();
    expect(composite.size).toBe(0);
  });
});

describe("MutableCloseable", () => {
  it("forwards close to the currently held token only", () => {
    const first = vi.fn();
    const second = vi.fn();
    const mutable = new MutableCloseable();

    mutable.set(closeable(first));
    mutable.set(closeable(second));
    mutable.close();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(mutable.isClosed).toBe(true);
  });

  it("closes a token set after close", () => {
    const mutable = new MutableCloseable();
    mutable.close();

    const late = vi.fn();
    mutable.set(closeable(late));

    expect(late).toHaveBeenCalledTimes(1);
  });

  it("closing with nothing held is a no-op", () => {
    const mutable = new MutableCloseable();
    expect(() => mutable.close()).not.toThrow();
    expect(mutable.isClosed).toBe(true);
  });
});
