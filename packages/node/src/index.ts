export {
  DEFAULT_HEAP_POLL_MS,
  DEFAULT_HEAP_PRESSURE_RATIO,
  resolveNodeRenderConfig,
  type EnvMap,
  type NodeLogLevel,
  type NodeRenderConfig,
} from "./config.js";
export { createNodeLogger } from "./logger.js";
export {
  readV8Heap,
  startHeapPressureMonitor,
  type HeapPressureMonitor,
  type HeapPressureMonitorOptions,
  type HeapReading,
} from "./heapPressure.js";
export {
  installNodeRenderDefaults,
  type InstallNodeRenderDefaultsOptions,
  type NodeRenderDefaults,
} from "./install.js";
