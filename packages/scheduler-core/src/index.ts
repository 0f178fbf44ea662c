// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core`
 * Purpose: Time-based task scheduling — one Scheduler contract over immediate, current-thread, pooled and virtual-time strategies.
 * Scope: Re-exports time values, cancellation tokens, the time-ordered queue, strategies, tracing and errors. Does not read env or construct loggers.
 * Invariants: No imports from packages/scheduler-runtime. Pool construction policy is injected.
 * Side-effects: none
 * @public
 */

// Cancellation tokens
export {
  type Closeable,
  CompositeCloseable,
  closeable,
  MutableCloseable,
  NOOP_CLOSEABLE,
} from "./closeable";
// Strategies
export {
  CurrentThreadScheduler,
  isTrampolineActive,
  runTrampolined,
} from "./current-thread";
// Errors
export {
  ExecutorShutdownError,
  InvalidTimeError,
  isExecutorShutdownError,
  isInvalidTimeError,
} from "./errors";
export { ImmediateScheduler } from "./immediate";
// Event-pipeline boundary
export type {
  Notification,
  Observable,
  Observer,
} from "./pipeline";
export { deliver } from "./pipeline";
export {
  type DelayedExecutor,
  type PendingTask,
  PoolScheduler,
  TimerPoolExecutor,
  type TimerPoolExecutorOptions,
} from "./pool";
// Queue
export { type Action, Schedule, type ScheduledAction } from "./schedule";
// Contract
export { AbstractScheduler, type Scheduler } from "./scheduler";
// Time
export {
  between,
  type Clock,
  type Duration,
  duration,
  EPOCH,
  type Instant,
  instant,
  isAfter,
  isBefore,
  latest,
  ONE_TICK,
  plus,
  systemClock,
  wallClock,
  ZERO,
} from "./time";
// Tracing
export { type TraceLogger, TracingScheduler } from "./tracing";
export { VirtualScheduler } from "./virtual";
