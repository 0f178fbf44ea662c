// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/closeable`
 * Purpose: Cancellation tokens — simple, composite and redirectable.
 * Scope: Token state machines only. Does not know about schedules or schedulers.
 * Invariants:
 * - close() is idempotent; only the first call has an effect
 * - Closed is terminal: a child added to a closed composite, or a token set on a closed mutable, is closed on arrival
 * - remove()/set() never close the token they drop
 * Side-effects: none
 * @public
 */

/** Handle that cancels exactly the registration it was issued for. */
export interface Closeable {
  close(): void;
}

/** Token for work that has already completed; closing it does nothing. */
export const NOOP_CLOSEABLE: Closeable = Object.freeze({
  close(): void {},
});

/** Wrap a teardown function so it runs at most once. */
export function closeable(teardown: () => void): Closeable {
  let closed = false;
  return {
    close(): void {
      if (closed) {
        return;
      }
      closed = true;
      teardown();
    },
  };
}

/**
 * Owns a dynamic set of child tokens and closes them together.
 */
export class CompositeCloseable implements Closeable {
  private children: Set<Closeable> | undefined = new Set();

  get isClosed(): boolean {
    return this.children === undefined;
  }

  get size(): number {
    return this.children?.size ?? 0;
  }

  add(child: Closeable): void {
    if (this.children === undefined) {
      child.close();
      return;
    }
    this.children.add(child);
  }

  /** Stop tracking `child` without closing it. */
  remove(child: Closeable): void {
    this.children?.delete(child);
  }

  close(): void {
    const children = this.children;
    if (children === undefined) {
      return;
    }
    this.children = undefined;
    for (const child of children) {
      child.close();
    }
  }
}

/**
 * Forwards close() to whichever token it currently holds.
 */
export class MutableCloseable implements Closeable {
  private current: Closeable | undefined;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Replace the held token. The previous one stays open. */
  set(next: Closeable): void {
    if (this.closed) {
      next.close();
      return;
    }
    this.current = next;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const current = this.current;
    this.current = undefined;
    current?.close();
  }
}
