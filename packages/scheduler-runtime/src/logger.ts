// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-runtime/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not format output.
 * Invariants: Always emits JSON to stdout; silent under test tooling (VITEST or NODE_ENV=test).
 * Side-effects: none
 * Notes: Use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import type { Config } from "./config";

export type { Logger } from "pino";

export function makeLogger(
  config: Pick<Config, "PINO_LOG_LEVEL" | "SERVICE_NAME">,
  bindings?: Record<string, unknown>
): Logger {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const nodeEnv = process.env.NODE_ENV ?? "development";

  const isTestTooling = isVitest || nodeEnv === "test";

  return pino(
    {
      level: config.PINO_LOG_LEVEL,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, service: config.SERVICE_NAME },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 1, sync: nodeEnv !== "production" })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
