import { describe, it, expect } from "vitest";
import { assessRisks } from "../../src/analytics/risk.js";
import { ValidationError } from "../../src/errors.js";
import { makeItem, makeSnapshot } from "./fixtures.js";

describe("assessRisks", () => {
  it("flags blocked high-priority bottlenecks", () => {
    const snapshot = makeSnapshot(
      [makeItem("g"), makeItem("h", { priority: "high" }), makeItem("i"), makeItem("j")],
      [
        ["g", "h"],
        ["h", "i"],
        ["h", "j"],
      ],
    );

    const risks = assessRisks(snapshot);
    expect(risks.highRiskTasks).toEqual([
      {
        id: "h",
        title: "Task h",
        priority: "high",
        riskScore: 6,
        riskFactors: [
          {
            severity: "medium",
            description: "single point of failure — blocks 2 tasks",
            mitigation: "Start h early or split it so its 2 dependents are not held up",
          },
          {
            severity: "high",
            description: "high-priority work is itself blocked",
            mitigation: "Finish its blockers first: g",
          },
        ],
      },
    ]);
    expect(risks.recommendations).toEqual([
      "Prioritize h (Task h): 2 tasks wait on it; clear its own blockers first",
    ]);
  });

  it("does not count done blockers as blocking", () => {
    const snapshot = makeSnapshot(
      [makeItem("g", { status: "done" }), makeItem("h", { priority: "critical" }), makeItem("i"), makeItem("j")],
      [
        ["g", "h"],
        ["h", "i"],
        ["h", "j"],
      ],
    );
    const [task] = assessRisks(snapshot).highRiskTasks;
    expect(task.riskFactors.map((f) => f.description)).toEqual(["single point of failure — blocks 2 tasks"]);
  });

  it("rates a single point of failure high once it blocks twice the threshold", () => {
    const snapshot = makeSnapshot(
      ["a", "b", "c", "d", "e"].map((id) => makeItem(id)),
      [
        ["a", "b"],
        ["a", "c"],
        ["a", "d"],
        ["a", "e"],
      ],
    );
    const [task] = assessRisks(snapshot).highRiskTasks;
    expect(task.riskFactors).toEqual([
      {
        severity: "high",
        description: "single point of failure — blocks 4 tasks",
        mitigation: "Start a early or split it so its 4 dependents are not held up",
      },
    ]);
  });

  it("orders high-risk tasks by score, then id", () => {
    const snapshot = makeSnapshot(
      ["a", "b", "c", "x1", "x2", "x3", "y1", "y2"].map((id) =>
        makeItem(id, { priority: id === "c" ? "low" : "medium" }),
      ),
      [
        ["b", "x1"],
        ["b", "x2"],
        ["a", "y1"],
        ["a", "y2"],
        ["c", "x1"],
        ["c", "x2"],
        ["c", "x3"],
      ],
    );
    const risks = assessRisks(snapshot);
    expect(risks.highRiskTasks.map((t) => [t.id, t.riskScore])).toEqual([
      ["a", 4],
      ["b", 4],
      ["c", 3],
    ]);
  });

  it("finds orphans, ignoring done items and parent links", () => {
    const snapshot = makeSnapshot(
      [makeItem("k"), makeItem("l"), makeItem("m"), makeItem("n", { status: "done" })],
      [],
      [["k", "l"]],
    );
    expect(assessRisks(snapshot).orphanedTasks).toEqual(["m"]);
  });

  it("reports disjoint cycles separately in canonical rotation", () => {
    const snapshot = makeSnapshot(
      [makeItem("a"), makeItem("m"), makeItem("z"), makeItem("p"), makeItem("q")],
      [
        ["z", "m"],
        ["m", "a"],
        ["a", "z"],
        ["p", "q"],
        ["q", "p"],
      ],
    );
    expect(assessRisks(snapshot).circularDependencies).toEqual([
      ["a", "z", "m"],
      ["p", "q"],
    ]);
  });

  it("reports every cycle through shared members, with a recommendation each", () => {
    const snapshot = makeSnapshot(
      [makeItem("A"), makeItem("B"), makeItem("C")],
      [
        ["A", "B"],
        ["B", "A"],
        ["A", "C"],
        ["C", "B"],
      ],
    );
    const risks = assessRisks(snapshot);
    expect(risks.circularDependencies).toEqual([
      ["A", "B"],
      ["A", "C", "B"],
    ]);
    expect(risks.recommendations).toEqual([
      "Prioritize A (Task A): 2 tasks wait on it",
      "Break the circular dependency A -> B -> A by removing one blocks edge",
      "Break the circular dependency A -> C -> B -> A by removing one blocks edge",
    ]);
  });

  it("uses the configured threshold", () => {
    const snapshot = makeSnapshot([makeItem("a"), makeItem("b")], [["a", "b"]]);
    expect(assessRisks(snapshot).highRiskTasks).toEqual([]);
    expect(assessRisks(snapshot, { spofThreshold: 1 }).highRiskTasks.map((t) => t.id)).toEqual(["a"]);
    expect(() => assessRisks(snapshot, { spofThreshold: 0 })).toThrow(ValidationError);
  });
});
