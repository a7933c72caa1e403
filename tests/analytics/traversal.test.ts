import { describe, it, expect } from "vitest";
import {
  Reachability,
  findCycles,
  stronglyConnectedComponents,
  transitiveBlockedFrom,
} from "../../src/analytics/traversal.js";
import { AnalyticsAbortedError } from "../../src/errors.js";
import { makeItem, makeSnapshot } from "./fixtures.js";

describe("stronglyConnectedComponents", () => {
  it("emits components in reverse topological order", () => {
    const snapshot = makeSnapshot(
      [makeItem("a"), makeItem("b"), makeItem("c")],
      [
        ["a", "b"],
        ["b", "c"],
        ["c", "b"],
      ],
    );
    expect(stronglyConnectedComponents(snapshot)).toEqual([["b", "c"], ["a"]]);
  });
});

describe("Reachability", () => {
  const snapshot = makeSnapshot(
    ["a", "b", "c", "d", "e", "f"].map((id) => makeItem(id, { status: id === "c" ? "done" : "todo" })),
    [
      ["a", "b"],
      ["b", "c"],
      ["c", "d"],
      ["d", "b"],
      ["a", "e"],
      ["e", "f"],
    ],
  );

  it("agrees with a plain breadth-first search for every node", () => {
    const reach = new Reachability(snapshot);
    for (const id of snapshot.ids) {
      expect(reach.transitiveBlocked(id)).toEqual(transitiveBlockedFrom(snapshot, id));
    }
  });

  it("includes other members of the node's own cycle", () => {
    const reach = new Reachability(snapshot);
    expect([...reach.reachable("b")].sort()).toEqual(["c", "d"]);
  });

  it("collects cycle members", () => {
    expect([...new Reachability(snapshot).cycleMembers()].sort()).toEqual(["b", "c", "d"]);
  });
});

describe("findCycles", () => {
  it("reports each cycle once", () => {
    const snapshot = makeSnapshot(
      [makeItem("A"), makeItem("B"), makeItem("C")],
      [
        ["A", "B"],
        ["B", "A"],
        ["B", "C"],
        ["C", "B"],
      ],
    );
    expect(findCycles(snapshot)).toEqual([
      ["A", "B"],
      ["B", "C"],
    ]);
  });

  it("finds a cycle that runs through members of an earlier one", () => {
    const snapshot = makeSnapshot(
      [makeItem("A"), makeItem("B"), makeItem("C")],
      [
        ["A", "B"],
        ["B", "A"],
        ["A", "C"],
        ["C", "B"],
      ],
    );
    expect(findCycles(snapshot)).toEqual([
      ["A", "B"],
      ["A", "C", "B"],
    ]);
  });

  it("stops when the deadline has passed", () => {
    const snapshot = makeSnapshot(
      [makeItem("a"), makeItem("b")],
      [
        ["a", "b"],
        ["b", "a"],
      ],
    );
    expect(() => findCycles(snapshot, { deadline: Date.now() - 1 })).toThrow(AnalyticsAbortedError);
  });

  it("returns nothing for a DAG", () => {
    const snapshot = makeSnapshot([makeItem("a"), makeItem("b")], [["a", "b"]]);
    expect(findCycles(snapshot)).toEqual([]);
  });
});
