import { edgeSchema, workItemSchema } from "./schemas.js";
import { buildSnapshot, type GraphSnapshot } from "./snapshot.js";
import {
  IndexInconsistentError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import type {
  DocumentSource,
  Edge,
  EdgeKind,
  GraphReader,
  IndexChange,
  RebuildReport,
  WorkItem,
} from "./types.js";

// ── Helpers ──────────────────────────────────────────────────────────

/** Code-unit ordering, independent of the host locale. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareEdges(a: Edge, b: Edge): number {
  return compareIds(a.from, b.from) || compareIds(a.to, b.to) || compareIds(a.kind, b.kind);
}

export function edgeKey(edge: Edge): string {
  return `${edge.kind}\u0000${edge.from}\u0000${edge.to}`;
}

interface IndexState {
  nodes: Map<string, WorkItem>;
  edges: Map<string, Edge>;
  /** Edge keys touching each node id, in either direction. */
  incident: Map<string, Set<string>>;
}

function emptyState(): IndexState {
  return { nodes: new Map(), edges: new Map(), incident: new Map() };
}

class ChangeRejected extends Error {}

/**
 * Apply one change to a state. Returns false when the change was already
 * reflected. Throws ChangeRejected before touching the state when the change
 * is invalid; any later failure is undone through the undo log.
 */
function applyTo(state: IndexState, change: IndexChange): boolean {
  const undo: Array<() => void> = [];

  const link = (id: string, key: string): void => {
    const existing = state.incident.get(id);
    const keys = existing ?? new Set<string>();
    if (!existing) {
      state.incident.set(id, keys);
      undo.push(() => state.incident.delete(id));
    }
    keys.add(key);
    undo.push(() => keys.delete(key));
  };

  const unlink = (id: string, key: string): void => {
    const keys = state.incident.get(id);
    if (!keys?.delete(key)) return;
    undo.push(() => keys.add(key));
    if (keys.size === 0) {
      state.incident.delete(id);
      undo.push(() => state.incident.set(id, keys));
    }
  };

  try {
    switch (change.type) {
      case "upsert_node": {
        const parsed = workItemSchema.safeParse(change.item);
        if (!parsed.success) {
          throw new ChangeRejected(`invalid work item: ${parsed.error.issues[0]?.message ?? "unknown"}`);
        }
        const item = Object.freeze({ ...parsed.data });
        const previous = state.nodes.get(item.id);
        if (previous && sameItem(previous, item)) return false;
        state.nodes.set(item.id, item);
        undo.push(() => (previous ? state.nodes.set(item.id, previous) : state.nodes.delete(item.id)));
        return true;
      }

      case "remove_node": {
        const previous = state.nodes.get(change.id);
        if (!previous) return false;
        const refs = state.incident.get(change.id);
        if (refs && refs.size > 0) {
          throw new ChangeRejected(`"${change.id}" is still referenced by ${refs.size} edge(s)`);
        }
        state.nodes.delete(change.id);
        undo.push(() => state.nodes.set(change.id, previous));
        return true;
      }

      case "add_edge": {
        const parsed = edgeSchema.safeParse(change.edge);
        if (!parsed.success) {
          throw new ChangeRejected(`malformed edge: ${parsed.error.issues[0]?.message ?? "unknown"}`);
        }
        const edge = parsed.data;
        if (edge.from === edge.to) {
          throw new ChangeRejected(`self-referencing ${edge.kind} edge on "${edge.from}"`);
        }
        for (const endpoint of [edge.from, edge.to]) {
          if (!state.nodes.has(endpoint)) {
            throw new ChangeRejected(`edge endpoint "${endpoint}" does not exist`);
          }
        }
        const key = edgeKey(edge);
        if (state.edges.has(key)) return false;
        state.edges.set(key, Object.freeze({ ...edge }));
        undo.push(() => state.edges.delete(key));
        link(edge.from, key);
        link(edge.to, key);
        return true;
      }

      case "remove_edge": {
        const key = edgeKey(change.edge);
        const previous = state.edges.get(key);
        if (!previous) return false;
        state.edges.delete(key);
        undo.push(() => state.edges.set(key, previous));
        unlink(previous.from, key);
        unlink(previous.to, key);
        return true;
      }
    }
  } catch (err) {
    for (const step of undo.reverse()) step();
    throw err;
  }
}

function sameItem(a: WorkItem, b: WorkItem): boolean {
  return (
    a.id === b.id &&
    a.title === b.title &&
    a.status === b.status &&
    a.priority === b.priority &&
    a.type === b.type &&
    a.estimatedEffortHours === b.estimatedEffortHours &&
    a.createdAt === b.createdAt &&
    a.updatedAt === b.updatedAt
  );
}

// ── GraphIndex ───────────────────────────────────────────────────────

/** Serialized index contents, identical for equal store contents. */
export interface IndexData {
  nodes: WorkItem[];
  edges: Edge[];
}

/**
 * Query-optimized mirror of the work-item store. Holds nothing the store
 * does not: it can always be thrown away and rebuilt from documents.
 *
 * Mutations are synchronous and validated before they land, so a reader
 * never observes a half-applied change. `rebuild()` fills a fresh state and
 * swaps it in with one assignment.
 */
export class GraphIndex implements GraphReader {
  private state: IndexState = emptyState();
  private revision = 0;
  /** Changes applied while a rebuild is scanning; replayed onto the new state. */
  private pending: IndexChange[] | null = null;

  /** Build an index from previously serialized contents. */
  static fromData(data: IndexData): GraphIndex {
    const index = new GraphIndex();
    const state = emptyState();
    const changes: IndexChange[] = [
      ...data.nodes.map((item): IndexChange => ({ type: "upsert_node", item })),
      ...data.edges.map((edge): IndexChange => ({ type: "add_edge", edge })),
    ];
    for (const change of changes) {
      try {
        applyTo(state, change);
      } catch (err) {
        throw new ValidationError(`Cannot load index data: ${errorMessage(err)}`, { change });
      }
    }
    index.state = state;
    index.revision = 1;
    return index;
  }

  /** Increments on every mutation that changed the contents. */
  get version(): number {
    return this.revision;
  }

  get size(): { nodes: number; edges: number } {
    return { nodes: this.state.nodes.size, edges: this.state.edges.size };
  }

  /**
   * Incorporate one store mutation. Idempotent: re-applying a change that is
   * already reflected is a no-op. On failure nothing changes and
   * IndexInconsistentError is thrown.
   */
  apply(change: IndexChange): boolean {
    let changed: boolean;
    try {
      changed = applyTo(this.state, change);
    } catch (err) {
      throw new IndexInconsistentError(`Index change rejected: ${errorMessage(err)}`, { change }, { cause: err });
    }
    if (changed) {
      this.revision++;
      this.pending?.push(change);
    }
    return changed;
  }

  /**
   * Discard the current state and rebuild from every document in the
   * source. Strict mode (default) fails on dangling edges and keeps the
   * old state; non-strict mode drops them and reports them.
   */
  async rebuild(source: DocumentSource, options: { strict?: boolean } = {}): Promise<RebuildReport> {
    const strict = options.strict ?? true;
    const startedAt = Date.now();
    if (this.pending) {
      throw new IndexInconsistentError("A rebuild is already in progress");
    }
    this.pending = [];

    try {
      const documents = await source.scan();
      const fresh = emptyState();
      const droppedEdges: Edge[] = [];

      for (const doc of documents) {
        if (fresh.nodes.has(doc.item.id)) {
          throw new ValidationError(`Duplicate work item id in store: ${doc.item.id}`, { id: doc.item.id });
        }
        try {
          applyTo(fresh, { type: "upsert_node", item: doc.item });
        } catch (err) {
          throw new ValidationError(`Invalid work item "${doc.item.id}": ${errorMessage(err)}`, { id: doc.item.id });
        }
      }

      for (const doc of documents) {
        const outgoing: Edge[] = [
          ...doc.blocks.map((to): Edge => ({ from: doc.item.id, to, kind: "blocks" })),
          ...doc.parentOf.map((to): Edge => ({ from: doc.item.id, to, kind: "parent_of" })),
        ];
        for (const edge of outgoing) {
          try {
            applyTo(fresh, { type: "add_edge", edge });
          } catch (err) {
            if (strict) {
              throw new ValidationError(`Invalid edge in store: ${errorMessage(err)}`, { edge });
            }
            droppedEdges.push(edge);
          }
        }
      }

      // Writes that landed while scanning may be missing from the scan.
      for (const change of this.pending) {
        try {
          applyTo(fresh, change);
        } catch {
          // Superseded by the scanned document contents.
          continue;
        }
      }

      this.state = fresh;
      this.revision++;
      return {
        nodes: fresh.nodes.size,
        edges: fresh.edges.size,
        droppedEdges: droppedEdges.sort(compareEdges),
        durationMs: Date.now() - startedAt,
      };
    } finally {
      this.pending = null;
    }
  }

  /** Immutable point-in-time view for analytics. */
  snapshot(): GraphSnapshot {
    return buildSnapshot(this, this.revision);
  }

  hasNode(id: string): boolean {
    return this.state.nodes.has(id);
  }

  getNode(id: string): WorkItem {
    const item = this.state.nodes.get(id);
    if (!item) throw new NotFoundError(id);
    return item;
  }

  getAllNodes(): WorkItem[] {
    return [...this.state.nodes.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  getAllEdges(kind: EdgeKind = "blocks"): Edge[] {
    return [...this.state.edges.values()].filter((e) => e.kind === kind).sort(compareEdges);
  }

  /** Every edge touching the id, in either direction. */
  edgesOf(id: string): Edge[] {
    const keys = this.state.incident.get(id);
    if (!keys) return [];
    const edges: Edge[] = [];
    for (const key of keys) {
      const edge = this.state.edges.get(key);
      if (edge) edges.push(edge);
    }
    return edges.sort(compareEdges);
  }

  toJSON(): IndexData {
    return {
      nodes: this.getAllNodes(),
      edges: [...this.state.edges.values()].sort(compareEdges),
    };
  }
}
