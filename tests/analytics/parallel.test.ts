import { describe, it, expect } from "vitest";
import { computeLayers, getParallelWork, readyNow } from "../../src/analytics/parallel.js";
import { makeItem, makeSnapshot } from "./fixtures.js";

describe("getParallelWork", () => {
  it("reports layers for the requested status only", () => {
    const snapshot = makeSnapshot(
      [makeItem("a", { status: "in-progress" }), makeItem("b"), makeItem("c")],
      [["a", "b"]],
    );

    const todo = getParallelWork(snapshot);
    expect(todo.readyNow).toEqual(["c"]);
    expect(todo.nextLevel).toEqual(["b"]);
    expect(todo.levels).toEqual([
      { level: 0, nodes: ["c"], maxParallel: 1 },
      { level: 1, nodes: ["b"], maxParallel: 1 },
    ]);

    const active = getParallelWork(snapshot, { statusFilter: "in-progress" });
    expect(active.readyNow).toEqual(["a"]);
    expect(active.nextLevel).toEqual([]);
    expect(active.levelCount).toBe(1);
  });

  it("caps parallelism and assignments at maxAgents", () => {
    const snapshot = makeSnapshot([
      makeItem("a", { priority: "low" }),
      makeItem("b", { priority: "high" }),
      makeItem("c"),
      makeItem("d", { priority: "critical" }),
    ]);

    const work = getParallelWork(snapshot, { maxAgents: 2 });
    expect(work.maxParallelism).toBe(2);
    expect(work.totalReady).toBe(4);
    expect(work.levels).toEqual([{ level: 0, nodes: ["a", "b", "c", "d"], maxParallel: 2 }]);
    expect(work.assignments).toEqual([
      { agent: "agent-1", tasks: ["d", "c"] },
      { agent: "agent-2", tasks: ["b", "a"] },
    ]);
  });

  it("returns an empty plan for an empty or finished graph", () => {
    const snapshot = makeSnapshot([makeItem("a", { status: "done" })]);
    expect(getParallelWork(snapshot)).toEqual({
      maxParallelism: 0,
      readyNow: [],
      totalReady: 0,
      levelCount: 0,
      nextLevel: [],
      levels: [],
      assignments: [],
      unassigned: [],
      cycleMembers: [],
    });
  });

  it("places every acyclic open node in exactly one layer after its blockers", () => {
    const ids = ["a", "b", "c", "d", "e", "f", "g", "h"];
    const edges: Array<[string, string]> = [
      ["a", "c"],
      ["b", "c"],
      ["c", "d"],
      ["a", "e"],
      ["e", "f"],
      ["d", "f"],
      ["g", "h"],
    ];
    const snapshot = makeSnapshot(
      ids.map((id) => makeItem(id, { status: id === "g" ? "done" : "todo" })),
      edges,
    );

    const { layers, unassigned } = computeLayers(snapshot);
    expect(unassigned).toEqual([]);

    const layerOf = new Map<string, number>();
    layers.forEach((layer, k) => {
      for (const id of layer) {
        expect(layerOf.has(id)).toBe(false);
        layerOf.set(id, k);
      }
    });
    expect([...layerOf.keys()].sort()).toEqual(["a", "b", "c", "d", "e", "f", "h"]);

    for (const [from, to] of edges) {
      const toLayer = layerOf.get(to);
      if (toLayer === undefined) continue;
      if (snapshot.isDone(from)) continue;
      expect(layerOf.get(from)).toBeLessThan(toLayer);
    }
    expect(layers).toEqual([["a", "b", "h"], ["c", "e"], ["d"], ["f"]]);
  });
});

describe("readyNow", () => {
  it("treats done blockers as satisfied", () => {
    const snapshot = makeSnapshot(
      [makeItem("a", { status: "done" }), makeItem("b"), makeItem("c")],
      [
        ["a", "b"],
        ["b", "c"],
      ],
    );
    expect(readyNow(snapshot)).toEqual(["b"]);
  });
});
