/**
 * packages/node/src/install.ts: One-call process defaults for Node hosts.
 *
 * Must run before the first renderer touches the global caches, since their
 * capacities are fixed on creation.
 */

import { type Logger, configureGlobalCaches, getGlobalMemoryPressure, setLogger } from "@styledtext/core";
import { type EnvMap, type NodeRenderConfig, resolveNodeRenderConfig } from "./config.js";
import { type HeapReading, startHeapPressureMonitor } from "./heapPressure.js";
import { createNodeLogger } from "./logger.js";

export type InstallNodeRenderDefaultsOptions = Readonly<{
  env?: EnvMap;
  /** Overrides the logger built from STYLEDTEXT_LOG_LEVEL. */
  logger?: Logger;
  readHeap?: () => HeapReading;
}>;

export type NodeRenderDefaults = Readonly<{
  config: NodeRenderConfig;
  logger: Logger;
  stop(): void;
}>;

export function installNodeRenderDefaults(
  opts: InstallNodeRenderDefaultsOptions = {},
): NodeRenderDefaults {
  const config = resolveNodeRenderConfig(opts.env ?? process.env);
  const logger = opts.logger ?? createNodeLogger(config.logLevel);
  // Throws once the global caches exist; nothing is installed in that case.
  configureGlobalCaches({
    sizeCacheMaxItems: config.sizeCacheMaxItems,
    bitmapCacheMaxBytes: config.bitmapCacheMaxBytes,
    clearOnWarning: config.clearOnMemoryPressure,
    logger,
  });
  setLogger(logger);
  const monitor = startHeapPressureMonitor({
    target: getGlobalMemoryPressure(),
    ratio: config.heapPressureRatio,
    intervalMs: config.heapPollIntervalMs,
    logger,
    ...(opts.readHeap !== undefined ? { readHeap: opts.readHeap } : {}),
  });
  logger.debug({ config }, "styledtext node defaults installed");
  return Object.freeze({ config, logger, stop: monitor.stop });
}
