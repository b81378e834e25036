/**
 * packages/node/src/config.ts: Environment configuration for Node hosts.
 *
 *   STYLEDTEXT_LOG_LEVEL=<pino level>        (default: silent)
 *   STYLEDTEXT_SIZE_CACHE_ITEMS=<int>        (default: 1000)
 *   STYLEDTEXT_BITMAP_CACHE_BYTES=<int>      (default: 20 MiB)
 *   STYLEDTEXT_CLEAR_ON_PRESSURE=0|1         (default: 1)
 *   STYLEDTEXT_HEAP_PRESSURE_RATIO=<0..1>    (default: 0.85)
 *   STYLEDTEXT_HEAP_POLL_MS=<int>            (default: 1000)
 *
 * Malformed numbers fall back to the defaults; an unknown log level throws.
 */

import {
  GLOBAL_BITMAP_CACHE_MAX_BYTES,
  GLOBAL_SIZE_CACHE_MAX_ITEMS,
  StyledTextError,
} from "@styledtext/core";

export type NodeLogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type NodeRenderConfig = Readonly<{
  logLevel: NodeLogLevel;
  sizeCacheMaxItems: number;
  bitmapCacheMaxBytes: number;
  clearOnMemoryPressure: boolean;
  heapPressureRatio: number;
  heapPollIntervalMs: number;
}>;

export type EnvMap = Readonly<Record<string, string | undefined>>;

export const DEFAULT_HEAP_PRESSURE_RATIO = 0.85;
export const DEFAULT_HEAP_POLL_MS = 1000;

const LOG_LEVELS: readonly NodeLogLevel[] = Object.freeze([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function readEnv(env: EnvMap, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function envFlag(env: EnvMap, name: string, fallback: boolean): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  if (norm === "1" || norm === "true" || norm === "yes" || norm === "on") return true;
  if (norm === "0" || norm === "false" || norm === "no" || norm === "off") return false;
  return fallback;
}

function envPositiveInt(env: EnvMap, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function envRatio(env: EnvMap, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed >= 1) return fallback;
  return parsed;
}

function isLogLevel(value: string): value is NodeLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function envLogLevel(env: EnvMap, name: string): NodeLogLevel {
  const value = readEnv(env, name);
  if (value === null) return "silent";
  const norm = value.toLowerCase();
  if (!isLogLevel(norm)) {
    throw new StyledTextError(
      "STX_INVALID_PROPS",
      `${name} must be one of ${LOG_LEVELS.join(", ")}; got "${value}"`,
    );
  }
  return norm;
}

export function resolveNodeRenderConfig(env: EnvMap = process.env): NodeRenderConfig {
  return Object.freeze({
    logLevel: envLogLevel(env, "STYLEDTEXT_LOG_LEVEL"),
    sizeCacheMaxItems: envPositiveInt(env, "STYLEDTEXT_SIZE_CACHE_ITEMS", GLOBAL_SIZE_CACHE_MAX_ITEMS),
    bitmapCacheMaxBytes: envPositiveInt(
      env,
      "STYLEDTEXT_BITMAP_CACHE_BYTES",
      GLOBAL_BITMAP_CACHE_MAX_BYTES,
    ),
    clearOnMemoryPressure: envFlag(env, "STYLEDTEXT_CLEAR_ON_PRESSURE", true),
    heapPressureRatio: envRatio(env, "STYLEDTEXT_HEAP_PRESSURE_RATIO", DEFAULT_HEAP_PRESSURE_RATIO),
    heapPollIntervalMs: envPositiveInt(env, "STYLEDTEXT_HEAP_POLL_MS", DEFAULT_HEAP_POLL_MS),
  });
}
