// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-runtime/config`
 * Purpose: Environment configuration with Zod validation.
 * Scope: Reads and validates env vars for logging and default scheduler wiring. Does not construct anything.
 * Invariants:
 * - Every variable has a default; an empty environment is valid
 * - Boolean flags accept only "true" or "false"
 * - Fails fast with one error listing every invalid variable
 * Side-effects: Reads process.env (when called without an explicit env)
 * @internal
 */

import { z } from "zod";

const BooleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const EnvSchema = z.object({
  /** Log level (default: info) */
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "silent"])
    .default("info"),

  /** Service name for logging (default: tickwork) */
  SERVICE_NAME: z.string().min(1).default("tickwork"),

  /** Wrap default schedulers in TracingScheduler (default: false) */
  SCHEDULER_TRACE: BooleanFlag.default("false"),

  /** Unref pool timers so pending work never holds the process open (default: true) */
  SCHEDULER_POOL_DAEMON: BooleanFlag.default("true"),
});

export type Config = z.infer<typeof EnvSchema>;

/**
 * Loads and validates configuration from environment.
 * Throws on invalid config with clear error messages.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): Config {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}
