/**
 * logger.ts — Shared pino logger for every module
 *
 * A single pino instance is created on first import and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Logs go to stderr so they never interleave with command output on stdout.
 *
 * Log level:
 *   • GAME_LAUNCH_LOG_LEVEL env var overrides everything (e.g. "debug", "trace")
 *   • otherwise                   → "warn"
 *
 * pino-pretty is used when stderr is a terminal, outside production and test runs.
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || process.env.NODE_TEST_CONTEXT !== undefined;
const level  = process.env.GAME_LAUNCH_LOG_LEVEL ?? "warn";

const pretty = !isProd && !isTest && process.stderr.isTTY === true;

export const logger = pretty
  ? pino({
      level,
      transport: {
        target:  "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    })
  : pino({ level }, pino.destination(2));
