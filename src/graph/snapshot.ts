import { NotFoundError } from "../errors.js";
import type { GraphReader, WorkItem } from "./types.js";

const EMPTY: ReadonlySet<string> = Object.freeze(new Set<string>());

/**
 * Immutable adjacency view over `blocks` edges. Built by copying out of the
 * index, so later index mutations never reach an existing snapshot.
 */
export class GraphSnapshot {
  /** Index version this snapshot was taken at. */
  readonly version: number;
  readonly nodes: ReadonlyMap<string, WorkItem>;
  /** id → ids it blocks. */
  readonly forward: ReadonlyMap<string, ReadonlySet<string>>;
  /** id → ids blocking it. */
  readonly backward: ReadonlyMap<string, ReadonlySet<string>>;
  /** Ids on either end of a parent_of edge. */
  readonly parentLinked: ReadonlySet<string>;
  /** Node ids in ascending order. */
  readonly ids: readonly string[];

  constructor(init: {
    version: number;
    nodes: Map<string, WorkItem>;
    forward: Map<string, Set<string>>;
    backward: Map<string, Set<string>>;
    parentLinked: Set<string>;
  }) {
    this.version = init.version;
    this.nodes = init.nodes;
    this.forward = init.forward;
    this.backward = init.backward;
    this.parentLinked = init.parentLinked;
    this.ids = Object.freeze([...init.nodes.keys()]);
    Object.freeze(this);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): WorkItem {
    const item = this.nodes.get(id);
    if (!item) throw new NotFoundError(id);
    return item;
  }

  /** Ids this node blocks. */
  blocks(id: string): ReadonlySet<string> {
    return this.forward.get(id) ?? EMPTY;
  }

  /** Ids blocking this node. */
  blockedBy(id: string): ReadonlySet<string> {
    return this.backward.get(id) ?? EMPTY;
  }

  isDone(id: string): boolean {
    return this.nodes.get(id)?.status === "done";
  }

  /** Count of nodes whose status is not done. */
  get openCount(): number {
    let count = 0;
    for (const item of this.nodes.values()) {
      if (item.status !== "done") count++;
    }
    return count;
  }
}

/** Materialize a snapshot from any reader of the index boundary. */
export function buildSnapshot(reader: GraphReader, version = 0): GraphSnapshot {
  const nodes = new Map<string, WorkItem>();
  for (const item of reader.getAllNodes()) {
    nodes.set(item.id, Object.freeze({ ...item }));
  }

  const forward = new Map<string, Set<string>>();
  const backward = new Map<string, Set<string>>();
  for (const id of nodes.keys()) {
    forward.set(id, new Set());
    backward.set(id, new Set());
  }

  for (const edge of reader.getAllEdges("blocks")) {
    const out = forward.get(edge.from);
    const into = backward.get(edge.to);
    // Endpoints missing from the node list would be dangling; the index never yields them.
    if (!out || !into) continue;
    out.add(edge.to);
    into.add(edge.from);
  }

  const parentLinked = new Set<string>();
  for (const edge of reader.getAllEdges("parent_of")) {
    if (nodes.has(edge.from) && nodes.has(edge.to)) {
      parentLinked.add(edge.from);
      parentLinked.add(edge.to);
    }
  }

  return new GraphSnapshot({ version, nodes, forward, backward, parentLinked });
}
