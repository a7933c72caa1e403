import { GraphIndex } from "../../src/graph/graph-index.js";
import type { GraphSnapshot } from "../../src/graph/snapshot.js";
import type { Edge, WorkItem } from "../../src/graph/types.js";

export const CREATED_AT = "2026-01-05T09:00:00.000Z";

export function makeItem(id: string, overrides: Partial<WorkItem> = {}): WorkItem {
  return {
    id,
    title: `Task ${id}`,
    status: "todo",
    priority: "medium",
    type: "feature",
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

export function makeIndex(
  items: WorkItem[],
  blocks: Array<[string, string]> = [],
  parents: Array<[string, string]> = [],
): GraphIndex {
  return GraphIndex.fromData({
    nodes: items,
    edges: [
      ...blocks.map(([from, to]): Edge => ({ from, to, kind: "blocks" })),
      ...parents.map(([from, to]): Edge => ({ from, to, kind: "parent_of" })),
    ],
  });
}

export function makeSnapshot(
  items: WorkItem[],
  blocks: Array<[string, string]> = [],
  parents: Array<[string, string]> = [],
): GraphSnapshot {
  return makeIndex(items, blocks, parents).snapshot();
}

/** A(critical) blocks B and C, B blocks D, E stands alone. */
export function scenarioSnapshot(): GraphSnapshot {
  return makeSnapshot(
    [
      makeItem("A", { priority: "critical" }),
      makeItem("B"),
      makeItem("C"),
      makeItem("D"),
      makeItem("E"),
    ],
    [
      ["A", "B"],
      ["A", "C"],
      ["B", "D"],
    ],
  );
}
