// Types (re-export as types)
export type {
  WorkItemStatus,
  Priority,
  WorkItemType,
  EdgeKind,
  WorkItem,
  Edge,
  WorkItemDocument,
  IndexChange,
  GraphReader,
  DocumentSource,
  RebuildReport,
} from "./types.js";

// Schemas (re-export values)
export {
  workItemStatusEnum,
  workItemStatusSchema,
  priorityEnum,
  workItemTypeEnum,
  edgeKindEnum,
  workItemSchema,
  edgeSchema,
  documentFrontmatterSchema,
  indexCacheSchema,
  retiredIdsSchema,
  createItemInputSchema,
  updateItemPatchSchema,
} from "./schemas.js";
export type { CreateItemInput, UpdateItemPatch, IndexCacheFile } from "./schemas.js";

// Index
export { GraphIndex, compareIds, compareEdges, edgeKey } from "./graph-index.js";
export type { IndexData } from "./graph-index.js";

// Snapshot
export { GraphSnapshot, buildSnapshot } from "./snapshot.js";

// Persistence
export {
  readManifest,
  saveIndexCache,
  loadIndexCache,
  openIndex,
} from "./persistence.js";
export type { Manifest, OpenedIndex } from "./persistence.js";
