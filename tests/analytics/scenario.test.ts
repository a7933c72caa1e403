import { describe, it, expect } from "vitest";
import { DependencyAnalytics } from "../../src/analytics/index.js";
import { makeIndex, makeItem, scenarioSnapshot } from "./fixtures.js";

describe("five-node scenario", () => {
  const snapshot = scenarioSnapshot();
  const analytics = new DependencyAnalytics({ snapshot: () => snapshot });

  it("ranks A as the top bottleneck", () => {
    const [top, ...rest] = analytics.findBottlenecks({ topN: 1 });
    expect(rest).toHaveLength(0);
    expect(top).toEqual({
      id: "A",
      title: "Task A",
      status: "todo",
      priority: "critical",
      blocksCount: 2,
      transitiveCount: 3,
      impactScore: 5,
      blockedTasks: ["B", "C"],
    });
  });

  it("reports A and E as ready now", () => {
    const work = analytics.getParallelWork();
    expect(work.readyNow).toEqual(["A", "E"]);
    expect(work.totalReady).toBe(2);
    expect(work.nextLevel).toEqual(["B", "C"]);
    expect(work.levelCount).toBe(3);
    expect(work.maxParallelism).toBe(2);
    expect(work.assignments).toEqual([
      { agent: "agent-1", tasks: ["A"] },
      { agent: "agent-2", tasks: ["E"] },
    ]);
    expect(work.unassigned).toEqual([]);
  });

  it("flags A as a single point of failure and E as orphaned", () => {
    const risks = analytics.assessRisks({ spofThreshold: 2 });
    expect(risks.highRiskTasks).toEqual([
      {
        id: "A",
        title: "Task A",
        priority: "critical",
        riskScore: 8,
        riskFactors: [
          {
            severity: "medium",
            description: "single point of failure — blocks 2 tasks",
            mitigation: "Start A early or split it so its 2 dependents are not held up",
          },
        ],
      },
    ]);
    expect(risks.orphanedTasks).toEqual(["E"]);
    expect(risks.circularDependencies).toEqual([]);
    expect(risks.recommendations).toEqual(["Prioritize A (Task A): 2 tasks wait on it"]);
  });

  it("recommends A before E", () => {
    const recs = analytics.recommendNextWork();
    expect(recs.map((r) => r.id)).toEqual(["A", "E"]);
    expect(recs[0].score).toBe(44);
    expect(recs[0].reasons).toEqual(["critical priority", "unblocks 2 tasks", "ready to start now"]);
    expect(recs[1].score).toBe(20);
  });

  it("suggests A and E side by side for two agents", () => {
    expect(analytics.planNextWork({ agentCount: 2 }).parallelSuggestions).toEqual([["A", "E"]]);
  });

  it("measures the impact of completing A", () => {
    expect(analytics.analyzeImpact("A")).toEqual({
      nodeId: "A",
      directDependents: 2,
      totalImpact: 3,
      completionImpact: 75,
      affectedNodes: ["B", "C", "D"],
    });
  });

  it("takes a fresh snapshot from the index on every call", () => {
    const index = makeIndex([makeItem("x"), makeItem("y")]);
    const live = new DependencyAnalytics(index);
    expect(live.findBottlenecks()).toEqual([]);

    index.apply({ type: "add_edge", edge: { from: "x", to: "y", kind: "blocks" } });
    expect(live.findBottlenecks().map((b) => b.id)).toEqual(["x"]);
  });
});

describe("cycle round-trip", () => {
  const index = makeIndex(
    [makeItem("A"), makeItem("B"), makeItem("C"), makeItem("D"), makeItem("X")],
    [
      ["A", "B"],
      ["B", "C"],
      ["C", "A"],
      ["C", "D"],
    ],
  );
  const analytics = new DependencyAnalytics(index);

  it("reports exactly one cycle", () => {
    expect(analytics.assessRisks().circularDependencies).toEqual([["A", "B", "C"]]);
  });

  it("never places cycle members in a layer", () => {
    const work = analytics.getParallelWork();
    const layered = work.levels.flatMap((level) => level.nodes);
    expect(layered).toEqual(["X"]);
    expect(work.unassigned).toEqual(["A", "B", "C", "D"]);
    expect(work.cycleMembers).toEqual(["A", "B", "C"]);
  });

  it("recommends breaking the cycle", () => {
    expect(analytics.assessRisks().recommendations).toContain(
      "Break the circular dependency A -> B -> C -> A by removing one blocks edge",
    );
  });
});
