// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/schedule`
 * Purpose: Time-ordered queue of pending actions keyed by (due time, arrival sequence).
 * Scope: In-memory indexed binary heap. Does not execute actions or read any clock.
 * Invariants:
 * - Dequeue order is time ascending, then sequence ascending (first registered, first run)
 * - Sequence numbers strictly increase and are never reused
 * - dequeueBefore(t) is exclusive: an entry due exactly at t stays queued
 * - An entry leaves the heap once, by dequeue or by its token; never returned twice
 * Side-effects: none
 * @public
 */

import { type Closeable, closeable } from "./closeable";
import type { Instant } from "./time";

/** Deferred, argumentless unit of work. */
export type Action = () => void;

export interface ScheduledAction {
  readonly time: Instant;
  readonly sequence: number;
  readonly action: Action;
}

interface HeapEntry extends ScheduledAction {
  /** Position in the heap array; -1 once removed. */
  index: number;
}

function precedes(a: ScheduledAction, b: ScheduledAction): boolean {
  return a.time < b.time || (a.time === b.time && a.sequence < b.sequence);
}

export class Schedule {
  private nextSequence = 0;
  private readonly heap: HeapEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  /** Earliest entry, left in place. */
  peek(): ScheduledAction | undefined {
    return this.heap[0];
  }

  enqueue(time: Instant, action: Action): Closeable {
    const entry: HeapEntry = {
      time,
      sequence: this.nextSequence++,
      action,
      index: this.heap.length,
    };
    this.heap.push(entry);
    this.siftUp(entry.index);
    return closeable(() => this.remove(entry));
  }

  dequeue(): ScheduledAction | undefined {
    const head = this.heap[0];
    if (head === undefined) {
      return undefined;
    }
    this.removeAt(0);
    return head;
  }

  /** Pop the earliest entry only if it is due strictly before `threshold`. */
  dequeueBefore(threshold: Instant): ScheduledAction | undefined {
    const head = this.heap[0];
    if (head === undefined || !(head.time < threshold)) {
      return undefined;
    }
    this.removeAt(0);
    return head;
  }

  private remove(entry: HeapEntry): void {
    if (entry.index >= 0) {
      this.removeAt(entry.index);
    }
  }

  private removeAt(index: number): void {
    const removed = this.heap[index];
    const last = this.heap.pop();
    if (removed === undefined || last === undefined) {
      return;
    }
    removed.index = -1;
    if (last === removed) {
      return;
    }
    this.heap[index] = last;
    last.index = index;
    this.siftUp(index);
    this.siftDown(last.index);
  }

  private siftUp(start: number): void {
    let index = start;
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const entry = this.heap[index];
      const parent = this.heap[parentIndex];
      if (
        entry === undefined ||
        parent === undefined ||
        !precedes(entry, parent)
      ) {
        return;
      }
      this.swap(index, parentIndex);
      index = parentIndex;
    }
  }

  private siftDown(start: number): void {
    let index = start;
    for (;;) {
      let smallest = index;
      for (const child of [2 * index + 1, 2 * index + 2]) {
        const candidate = this.heap[child];
        const current = this.heap[smallest];
        if (
          candidate !== undefined &&
          current !== undefined &&
          precedes(candidate, current)
        ) {
          smallest = child;
        }
      }
      if (smallest === index) {
        return;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) {
      return;
    }
    this.heap[i] = b;
    this.heap[j] = a;
    b.index = i;
    a.index = j;
  }
}
