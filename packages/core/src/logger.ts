/**
 * packages/core/src/logger.ts: Module logger shared by caches and renderers.
 *
 * Silent by default. Hosts install their own pino instance with setLogger()
 * (see @styledtext/node for the stderr logger driven by STYLEDTEXT_LOG_LEVEL).
 */

import { type Logger, pino } from "pino";

let current: Logger = pino({ name: "styledtext", level: "silent" });

export function getLogger(): Logger {
  return current;
}

export function setLogger(logger: Logger): void {
  current = logger;
}

export type { Logger };
