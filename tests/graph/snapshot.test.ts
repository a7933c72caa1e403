import { describe, it, expect } from "vitest";
import { buildSnapshot } from "../../src/graph/snapshot.js";
import { NotFoundError } from "../../src/errors.js";
import type { GraphReader } from "../../src/graph/types.js";
import { makeIndex, makeItem } from "../analytics/fixtures.js";

describe("GraphSnapshot", () => {
  it("derives backward adjacency from blocks edges only", () => {
    const snapshot = makeIndex(
      [makeItem("a"), makeItem("b"), makeItem("c")],
      [["a", "b"]],
      [["c", "a"]],
    ).snapshot();

    expect([...snapshot.blocks("a")]).toEqual(["b"]);
    expect([...snapshot.blockedBy("b")]).toEqual(["a"]);
    expect([...snapshot.blockedBy("a")]).toEqual([]);
    expect([...snapshot.parentLinked].sort()).toEqual(["a", "c"]);
  });

  it("is isolated from later index mutations", () => {
    const index = makeIndex([makeItem("a"), makeItem("b")]);
    const before = index.snapshot();

    index.apply({ type: "add_edge", edge: { from: "a", to: "b", kind: "blocks" } });
    index.apply({ type: "upsert_node", item: makeItem("a", { status: "done" }) });
    index.apply({ type: "upsert_node", item: makeItem("c") });

    expect(before.blocks("a").size).toBe(0);
    expect(before.getNode("a").status).toBe("todo");
    expect(before.has("c")).toBe(false);
    expect(before.version).toBeLessThan(index.version);
    expect(index.snapshot().blocks("a").has("b")).toBe(true);
  });

  it("freezes itself and its items", () => {
    const snapshot = makeIndex([makeItem("a")]).snapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.getNode("a"))).toBe(true);
    expect(Object.isFrozen(snapshot.ids)).toBe(true);
  });

  it("counts open items", () => {
    const snapshot = makeIndex([makeItem("a"), makeItem("b", { status: "done" }), makeItem("c")]).snapshot();
    expect(snapshot.openCount).toBe(2);
    expect(snapshot.isDone("b")).toBe(true);
  });

  it("throws NotFoundError for unknown ids", () => {
    const snapshot = makeIndex([makeItem("a")]).snapshot();
    expect(() => snapshot.getNode("zz")).toThrow(NotFoundError);
  });

  it("only ever contains edges whose endpoints exist", () => {
    const reader: GraphReader = {
      getAllNodes: () => [makeItem("a")],
      getAllEdges: (kind = "blocks") => (kind === "blocks" ? [{ from: "a", to: "gone", kind }] : []),
      getNode: () => makeItem("a"),
    };
    const snapshot = buildSnapshot(reader);
    expect(snapshot.blocks("a").size).toBe(0);
    for (const [from, targets] of snapshot.forward) {
      expect(snapshot.has(from)).toBe(true);
      for (const to of targets) expect(snapshot.has(to)).toBe(true);
    }
  });
});
