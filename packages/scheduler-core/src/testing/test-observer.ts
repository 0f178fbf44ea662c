// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/testing/test-observer`
 * Purpose: Observer that records every notification with the scheduler's clock at arrival.
 * Scope: Recording only; never schedules.
 * Side-effects: none
 * @public
 */

import type { Notification, Observer } from "../pipeline";
import type { Scheduler } from "../scheduler";
import type { Recorded } from "./recorded";

export class TestObserver<T> implements Observer<T> {
  private readonly recorded: Recorded<T>[] = [];

  constructor(private readonly scheduler: Scheduler) {}

  get notifications(): readonly Recorded<T>[] {
    return [...this.recorded];
  }

  onNext(value: T): void {
    this.record({ kind: "next", value });
  }

  onError(error: Error): void {
    this.record({ kind: "error", error });
  }

  onCompleted(): void {
    this.record({ kind: "completed" });
  }

  private record(notification: Notification<T>): void {
    this.recorded.push({ time: this.scheduler.now(), notification });
  }
}
