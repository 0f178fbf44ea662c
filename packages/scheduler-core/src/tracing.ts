// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/tracing`
 * Purpose: Decorator that logs scheduling and cancellation calls of any Scheduler.
 * Scope: Forwards every call to the wrapped scheduler unchanged. Does not log action execution or failures.
 * Invariants:
 * - Scheduling semantics (timing, order, cancellation) are exactly the inner scheduler's
 * - With trace disabled, the inner token is returned as-is
 * Side-effects: IO (emits trace log entries via provided logger)
 * @public
 */

import { type Closeable, closeable } from "./closeable";
import type { Action } from "./schedule";
import { AbstractScheduler, type Scheduler } from "./scheduler";
import type { Duration, Instant } from "./time";

/**
 * Logger interface expected by the tracer.
 * Compatible with pino's Logger type.
 */
export interface TraceLogger {
  isLevelEnabled(level: string): boolean;
  trace(obj: Record<string, unknown>, msg?: string): void;
}

type TraceFields = Record<string, unknown> & { op: string };

export class TracingScheduler extends AbstractScheduler {
  constructor(
    private readonly inner: Scheduler,
    private readonly log: TraceLogger
  ) {
    super();
  }

  now(): Instant {
    return this.inner.now();
  }

  override schedule(action: Action): Closeable {
    return this.trace({ op: "schedule" }, () => this.inner.schedule(action));
  }

  scheduleAt(at: Instant, action: Action): Closeable {
    return this.trace({ op: "scheduleAt", at }, () =>
      this.inner.scheduleAt(at, action)
    );
  }

  override scheduleAfter(delay: Duration, action: Action): Closeable {
    return this.trace({ op: "scheduleAfter", delay }, () =>
      this.inner.scheduleAfter(delay, action)
    );
  }

  private trace(fields: TraceFields, submit: () => Closeable): Closeable {
    if (!this.log.isLevelEnabled("trace")) {
      return submit();
    }
    this.log.trace(fields, "schedule");
    const token = submit();
    return closeable(() => {
      this.log.trace(fields, "cancel");
      token.close();
    });
  }
}
