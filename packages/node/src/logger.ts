/**
 * packages/node/src/logger.ts: pino logger writing to stderr.
 *
 * stdout stays free for the host's own output.
 */

import type { Logger } from "@styledtext/core";
import { destination, pino } from "pino";
import type { NodeLogLevel } from "./config.js";

export function createNodeLogger(level: NodeLogLevel, name = "styledtext"): Logger {
  return pino({ name, level }, destination(2));
}
