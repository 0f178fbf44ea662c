// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-runtime/schedulers`
 * Purpose: Composition root for the process-wide default schedulers.
 * Scope: Builds immediate, current-thread and pool schedulers over one shared TimerPoolExecutor. Does not schedule work itself.
 * Invariants:
 * - Only file that constructs the shared executor
 * - Tracing wraps the schedulers only when SCHEDULER_TRACE is set; semantics are unchanged either way
 * - getSchedulers() builds once per process
 * Side-effects: Reads process.env on first getSchedulers() call
 * @public
 */

import {
  CurrentThreadScheduler,
  ImmediateScheduler,
  PoolScheduler,
  type Scheduler,
  TimerPoolExecutor,
  TracingScheduler,
} from "@tickwork/scheduler-core";

import { type Config, loadConfig } from "./config";
import { type Logger, makeLogger } from "./logger";

export interface DefaultSchedulers {
  immediate: Scheduler;
  currentThread: Scheduler;
  pool: Scheduler;
  /** Executor behind `pool`; exposed so hosts can shut it down. */
  executor: TimerPoolExecutor;
}

export function createSchedulers(
  config: Config,
  logger: Logger
): DefaultSchedulers {
  const executor = new TimerPoolExecutor({
    daemon: config.SCHEDULER_POOL_DAEMON,
  });

  const wrap = (name: string, scheduler: Scheduler): Scheduler =>
    config.SCHEDULER_TRACE
      ? new TracingScheduler(scheduler, logger.child({ scheduler: name }))
      : scheduler;

  logger.debug(
    { trace: config.SCHEDULER_TRACE, daemon: config.SCHEDULER_POOL_DAEMON },
    "default schedulers created"
  );

  return {
    immediate: wrap("immediate", new ImmediateScheduler()),
    currentThread: wrap("current-thread", new CurrentThreadScheduler()),
    pool: wrap("pool", new PoolScheduler(executor)),
    executor,
  };
}

let defaults: DefaultSchedulers | undefined;

/** Lazily built process-wide schedulers, configured from process.env. */
export function getSchedulers(): DefaultSchedulers {
  if (defaults === undefined) {
    const config = loadConfig();
    defaults = createSchedulers(
      config,
      makeLogger(config, { component: "schedulers" })
    );
  }
  return defaults;
}
