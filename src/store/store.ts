import {
  createItemInputSchema,
  edgeKindEnum,
  idSchema,
  updateItemPatchSchema,
  type CreateItemInput,
  type UpdateItemPatch,
} from "../graph/schemas.js";
import type { GraphIndex } from "../graph/graph-index.js";
import { openIndex, readManifest, saveIndexCache, type Manifest } from "../graph/persistence.js";
import { DEFAULT_LOCK_OPTIONS, KeyedLock, type LockOptions } from "./lock.js";
import { documentExists, loadAllDocuments, loadDocument, loadRetiredIds } from "./reader.js";
import { removeDocument, writeDocument, writeRetiredIds } from "./writer.js";
import { lockPath } from "./paths.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { parseInput } from "../utils/validate.js";
import type {
  DocumentSource,
  Edge,
  EdgeKind,
  RebuildReport,
  WorkItem,
  WorkItemDocument,
} from "../graph/types.js";

/** Lock key for retired.yaml. Item ids cannot start with "_", so it never collides. */
const RETIRED_KEY = "_retired";

/** updatedAt never moves backwards, even if the clock does. */
function nextTimestamp(previous: string): string {
  const now = new Date();
  const floor = Date.parse(previous);
  return (now.getTime() >= floor ? now : new Date(floor)).toISOString();
}

/** Ids become file names under items/ and locks/, so they are checked before any path is built. */
function parseId(id: string): string {
  return parseInput(idSchema, id, "work item id");
}

export interface StoreOptions {
  lock?: Partial<LockOptions>;
  /** Passed to the rebuild when no usable index cache exists. Defaults to true. */
  strict?: boolean;
}

/**
 * Source of truth: one markdown document per work item under
 * `<dataDir>/items`. Every mutation is an atomic file write made under the
 * affected documents' locks, followed by the matching index change.
 */
export class WorkItemStore implements DocumentSource {
  private readonly locks: KeyedLock;
  private saving: Promise<void> = Promise.resolve();

  private constructor(
    readonly dataDir: string,
    readonly index: GraphIndex,
    private readonly manifest: Manifest,
    options: StoreOptions,
  ) {
    this.locks = new KeyedLock((key) => lockPath(dataDir, key), {
      ...DEFAULT_LOCK_OPTIONS,
      ...options.lock,
    });
  }

  /** Open a data dir, loading the index cache or rebuilding it from documents. */
  static async open(dataDir: string, options: StoreOptions = {}): Promise<WorkItemStore> {
    const source: DocumentSource = { scan: () => loadAllDocuments(dataDir) };
    const { index, manifest } = await openIndex(dataDir, source, { strict: options.strict });
    return new WorkItemStore(dataDir, index, { ...manifest }, options);
  }

  // ── Reads ──────────────────────────────────────────────────────────

  scan(): Promise<WorkItemDocument[]> {
    return loadAllDocuments(this.dataDir);
  }

  async getDocument(id: string): Promise<WorkItemDocument> {
    return loadDocument(this.dataDir, parseId(id));
  }

  async getItem(id: string): Promise<WorkItem> {
    return (await this.getDocument(id)).item;
  }

  // ── Writes ─────────────────────────────────────────────────────────

  async createItem(input: CreateItemInput): Promise<WorkItem> {
    const parsed = parseInput(createItemInputSchema, input, "work item");

    return this.locks.withLocks([parsed.id], async () => {
      if (this.index.hasNode(parsed.id) || (await documentExists(this.dataDir, parsed.id))) {
        throw new ValidationError(`Work item already exists: ${parsed.id}`, { id: parsed.id });
      }
      const retired = await loadRetiredIds(this.dataDir);
      if (retired.has(parsed.id)) {
        throw new ValidationError(`Work item id was used before and cannot be reused: ${parsed.id}`, {
          id: parsed.id,
        });
      }

      const now = new Date().toISOString();
      const item: WorkItem = {
        id: parsed.id,
        title: parsed.title,
        status: "todo",
        priority: parsed.priority,
        type: parsed.type,
        createdAt: now,
        updatedAt: now,
      };
      if (parsed.estimatedEffortHours !== undefined) {
        item.estimatedEffortHours = parsed.estimatedEffortHours;
      }

      await this.persist({ item, blocks: [], parentOf: [], body: parsed.body });
      this.index.apply({ type: "upsert_node", item });
      await this.saveCache();
      return item;
    });
  }

  async updateItem(id: string, patch: UpdateItemPatch): Promise<WorkItem> {
    parseId(id);
    const parsed = parseInput(updateItemPatchSchema, patch, "update");

    return this.locks.withLocks([id], async () => {
      const doc = await loadDocument(this.dataDir, id);
      const item: WorkItem = {
        ...doc.item,
        title: parsed.title ?? doc.item.title,
        status: parsed.status ?? doc.item.status,
        priority: parsed.priority ?? doc.item.priority,
        type: parsed.type ?? doc.item.type,
        updatedAt: nextTimestamp(doc.item.updatedAt),
      };
      if (parsed.estimatedEffortHours === null) {
        delete item.estimatedEffortHours;
      } else if (parsed.estimatedEffortHours !== undefined) {
        item.estimatedEffortHours = parsed.estimatedEffortHours;
      }

      await this.persist({ ...doc, item, body: parsed.body ?? doc.body });
      this.index.apply({ type: "upsert_node", item });
      await this.saveCache();
      return item;
    });
  }

  /**
   * Add a directed edge, stored in the `from` document. Both endpoints must
   * exist. Returns false when the edge was already present.
   */
  async addEdge(from: string, to: string, kind: EdgeKind = "blocks"): Promise<boolean> {
    const edge = this.checkEdge(from, to, kind);

    return this.locks.withLocks([from, to], async () => {
      const doc = await this.loadEndpoint(from, edge);
      await this.loadEndpoint(to, edge);

      const targets = kind === "blocks" ? doc.blocks : doc.parentOf;
      if (targets.includes(to)) {
        // Already on disk; make sure the index agrees.
        this.index.apply({ type: "add_edge", edge });
        return false;
      }

      const updated: WorkItemDocument = {
        ...doc,
        item: { ...doc.item, updatedAt: nextTimestamp(doc.item.updatedAt) },
        blocks: kind === "blocks" ? [...doc.blocks, to] : doc.blocks,
        parentOf: kind === "parent_of" ? [...doc.parentOf, to] : doc.parentOf,
      };
      await this.persist(updated);
      this.index.apply({ type: "upsert_node", item: updated.item });
      this.index.apply({ type: "add_edge", edge });
      await this.saveCache();
      return true;
    });
  }

  /** Remove an edge. Returns false when it did not exist. */
  async removeEdge(from: string, to: string, kind: EdgeKind = "blocks"): Promise<boolean> {
    const edge = this.checkEdge(from, to, kind);

    return this.locks.withLocks([from, to], async () => {
      const doc = await loadDocument(this.dataDir, from);
      const targets = kind === "blocks" ? doc.blocks : doc.parentOf;
      if (!targets.includes(to)) {
        this.index.apply({ type: "remove_edge", edge });
        return false;
      }

      const updated: WorkItemDocument = {
        ...doc,
        item: { ...doc.item, updatedAt: nextTimestamp(doc.item.updatedAt) },
        blocks: kind === "blocks" ? doc.blocks.filter((id) => id !== to) : doc.blocks,
        parentOf: kind === "parent_of" ? doc.parentOf.filter((id) => id !== to) : doc.parentOf,
      };
      await this.persist(updated);
      this.index.apply({ type: "upsert_node", item: updated.item });
      this.index.apply({ type: "remove_edge", edge });
      await this.saveCache();
      return true;
    });
  }

  /**
   * Delete an item. Rejected while any edge references it, in either
   * direction. The id is retired and can never be created again.
   */
  async deleteItem(id: string): Promise<void> {
    parseId(id);
    await this.locks.withLocks([id], async () => {
      const doc = await loadDocument(this.dataDir, id);
      const referencing: Edge[] = [
        ...doc.blocks.map((to): Edge => ({ from: id, to, kind: "blocks" })),
        ...doc.parentOf.map((to): Edge => ({ from: id, to, kind: "parent_of" })),
      ];
      // Incoming edges live in other documents; scan them rather than trust the index.
      for (const other of await loadAllDocuments(this.dataDir)) {
        if (other.item.id === id) continue;
        if (other.blocks.includes(id)) referencing.push({ from: other.item.id, to: id, kind: "blocks" });
        if (other.parentOf.includes(id)) referencing.push({ from: other.item.id, to: id, kind: "parent_of" });
      }
      if (referencing.length > 0) {
        throw new ValidationError(`Cannot delete "${id}": it is referenced by ${referencing.length} edge(s)`, {
          id,
          edges: referencing,
        });
      }

      await this.locks.withLock(RETIRED_KEY, async () => {
        const retired = await loadRetiredIds(this.dataDir);
        retired.add(id);
        await writeRetiredIds(this.dataDir, retired);
      });
      await removeDocument(this.dataDir, id);
      delete this.manifest[`${id}.md`];
      this.index.apply({ type: "remove_node", id });
      await this.saveCache();
    });
  }

  /** Rebuild the index from every document and rewrite the cache. */
  async reindex(options: { strict?: boolean } = {}): Promise<RebuildReport> {
    const manifest = await readManifest(this.dataDir);
    const report = await this.index.rebuild(this, options);
    for (const key of Object.keys(this.manifest)) delete this.manifest[key];
    Object.assign(this.manifest, manifest);
    await this.saveCache();
    return report;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private checkEdge(from: string, to: string, kind: EdgeKind): Edge {
    parseId(from);
    parseId(to);
    const parsedKind = parseInput(edgeKindEnum, kind, "edge kind");
    if (from === to) {
      throw new ValidationError(`An item cannot ${parsedKind === "blocks" ? "block" : "parent"} itself: ${from}`, {
        from,
        to,
      });
    }
    return { from, to, kind: parsedKind };
  }

  private async loadEndpoint(id: string, edge: Edge): Promise<WorkItemDocument> {
    try {
      return await loadDocument(this.dataDir, id);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new ValidationError(`Edge ${edge.from} -[${edge.kind}]-> ${edge.to} references missing item "${id}"`, {
          edge,
          missing: id,
        });
      }
      throw err;
    }
  }

  private async persist(doc: WorkItemDocument): Promise<void> {
    this.manifest[`${doc.item.id}.md`] = await writeDocument(this.dataDir, doc);
  }

  /** Cache writes are queued so the last one always reflects the latest state. */
  private saveCache(): Promise<void> {
    const run = this.saving.then(() => saveIndexCache(this.dataDir, this.index, { ...this.manifest }));
    // Failures reach the caller through `run`; the queue itself keeps going.
    this.saving = run.catch(() => undefined);
    return run;
  }
}
