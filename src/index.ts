export * from "./graph/index.js";
export * from "./analytics/index.js";
export { WorkItemStore } from "./store/store.js";
export type { StoreOptions } from "./store/store.js";
export { parseDocument, serializeDocument } from "./store/document.js";
export { KeyedLock, DEFAULT_LOCK_OPTIONS } from "./store/lock.js";
export type { LockOptions } from "./store/lock.js";
export {
  WorkGraphError,
  ValidationError,
  IndexInconsistentError,
  NotFoundError,
  AnalyticsAbortedError,
} from "./errors.js";
export { loadConfig, CONFIG_FILE } from "./config/loader.js";
export { workgraphConfigSchema } from "./config/schema.js";
export type { WorkGraphConfig, AnalyticsDefaults } from "./types.js";
export { openWorkGraph } from "./workgraph.js";
export type { WorkGraph, OpenWorkGraphOptions } from "./workgraph.js";
