/** Work item status lifecycle. Transitions are caller-driven, never inferred. */
export type WorkItemStatus = "todo" | "in-progress" | "blocked" | "done";

export type Priority = "low" | "medium" | "high" | "critical";

export type WorkItemType = "feature" | "bug" | "track" | "epic";

/** Relation kinds. `blocks(a → b)`: b cannot start until a is done. */
export type EdgeKind = "blocks" | "parent_of";

/** A trackable unit of work. */
export interface WorkItem {
  /** Opaque stable identifier. Never reused once deleted. */
  id: string;
  title: string;
  status: WorkItemStatus;
  priority: Priority;
  type: WorkItemType;
  /** Best-effort estimate in hours. Absent when unknown. */
  estimatedEffortHours?: number;
  /** ISO 8601 timestamp. */
  createdAt: string;
  /** ISO 8601 timestamp, never earlier than createdAt. */
  updatedAt: string;
}

/** Directed relation between two work item ids. */
export interface Edge {
  from: string;
  to: string;
  kind: EdgeKind;
}

/**
 * Persisted unit of the store: one item plus its outgoing edges and the
 * markdown body below the frontmatter.
 */
export interface WorkItemDocument {
  item: WorkItem;
  /** Ids this item blocks. */
  blocks: string[];
  /** Ids this item groups (track → feature, epic → bug, ...). */
  parentOf: string[];
  body: string;
}

/** One store mutation, as incorporated by the index. */
export type IndexChange =
  | { type: "upsert_node"; item: WorkItem }
  | { type: "remove_node"; id: string }
  | { type: "add_edge"; edge: Edge }
  | { type: "remove_edge"; edge: Edge };

/** Read boundary between the index and everything that consumes it. */
export interface GraphReader {
  /** All items, sorted by id. */
  getAllNodes(): WorkItem[];
  /** All edges of one kind, sorted by from then to. */
  getAllEdges(kind?: EdgeKind): Edge[];
  /** Throws NotFoundError when the id is unknown. */
  getNode(id: string): WorkItem;
}

/** Anything the index can be rebuilt from. */
export interface DocumentSource {
  scan(): Promise<WorkItemDocument[]>;
}

/** Outcome of a full index rebuild. */
export interface RebuildReport {
  nodes: number;
  edges: number;
  /** Edges dropped because an endpoint is missing (non-strict rebuilds only). */
  droppedEdges: Edge[];
  durationMs: number;
}
