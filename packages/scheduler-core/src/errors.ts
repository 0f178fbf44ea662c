// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/errors`
 * Purpose: Domain error classes for scheduling operations.
 * Scope: Error definitions and type guards. Action failures are never wrapped in these; they propagate as thrown.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class InvalidTimeError extends Error {
  public readonly code = "INVALID_TIME" as const;
  constructor(
    public readonly kind: "instant" | "duration",
    public readonly value: number
  ) {
    super(`Invalid ${kind}: ${value} is not a finite number of milliseconds`);
    this.name = "InvalidTimeError";
  }
}

export class ExecutorShutdownError extends Error {
  public readonly code = "EXECUTOR_SHUTDOWN" as const;
  constructor() {
    super("Executor has been shut down; no further tasks are accepted");
    this.name = "ExecutorShutdownError";
  }
}

// Type guards

export function isInvalidTimeError(error: unknown): error is InvalidTimeError {
  return error instanceof Error && error.name === "InvalidTimeError";
}

export function isExecutorShutdownError(
  error: unknown
): error is ExecutorShutdownError {
  return error instanceof Error && error.name === "ExecutorShutdownError";
}
