// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-runtime`
 * Purpose: Runtime wiring for scheduler-core — configuration, logging and default schedulers.
 * Scope: Re-exports config loader, logger factories and scheduler composition root.
 * Invariants: Domain logic stays in @tickwork/scheduler-core.
 * Side-effects: none
 * @public
 */

export { type Config, loadConfig } from "./config";
export { type Logger, makeLogger, makeNoopLogger } from "./logger";
export {
  createSchedulers,
  type DefaultSchedulers,
  getSchedulers,
} from "./schedulers";
