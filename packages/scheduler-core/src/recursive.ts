// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/recursive`
 * Purpose: State machine behind scheduleRecursive/scheduleRecursiveAfter.
 * Scope: Tracks the single pending step of a self-rescheduling action. Does not choose when steps run; the injected submit function does.
 * Invariants:
 * - The composite holds only the pending step; a step leaves it before its body runs
 * - The next step's token joins the composite before that step can run
 * - Once closed, continue() is refused and nothing further is submitted
 * - An error escaping a step closes the chain, then propagates unchanged
 * Side-effects: none
 * @internal
 */

import { type Closeable, CompositeCloseable, MutableCloseable } from "./closeable";
import type { Action } from "./schedule";

/** Submits one step with the arguments passed to continue(). */
export type StepSubmitter<TArgs extends unknown[]> = (
  args: TArgs,
  step: Action
) => Closeable;

export type RecursiveBody<TArgs extends unknown[]> = (
  continueWith: (...args: TArgs) => void
) => void;

export class RecursiveChain<TArgs extends unknown[]> implements Closeable {
  private readonly pending = new CompositeCloseable();

  constructor(
    private readonly submit: StepSubmitter<TArgs>,
    private readonly body: RecursiveBody<TArgs>
  ) {}

  get isClosed(): boolean {
    return this.pending.isClosed;
  }

  /** Request the next step. Passed to the body as its continuation. */
  readonly continueWith = (...args: TArgs): void => {
    if (this.pending.isClosed) {
      return;
    }
    const step = new MutableCloseable();
    this.pending.add(step);
    step.set(this.submit(args, () => this.runStep(step)));
  };

  close(): void {
    this.pending.close();
  }

  private runStep(step: Closeable): void {
    this.pending.remove(step);
    try {
      this.body(this.continueWith);
    } catch (error) {
      this.pending.close();
      throw error;
    }
  }
}
