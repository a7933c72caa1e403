import { z } from "zod";
import { compareIds } from "../graph/graph-index.js";
import { DEFAULT_SCORING, priorityWeight, type ScoringConfig } from "./weights.js";
import { checkAborted, findCycles } from "./traversal.js";
import { parseInput } from "../utils/validate.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type { AnalyticsCallOptions, HighRiskTask, RiskAssessment, RiskFactor } from "./types.js";

export const riskOptionsSchema = z.object({
  /** Direct dependents at which an item counts as a single point of failure. */
  spofThreshold: z.number().int().positive().default(2),
});

export type RiskOptions = z.input<typeof riskOptionsSchema> & AnalyticsCallOptions;

/**
 * Structural risks: single points of failure, circular dependencies and
 * orphaned work. Cycles are part of the result, never an error.
 */
export function assessRisks(
  snapshot: GraphSnapshot,
  options: RiskOptions = {},
  scoring: ScoringConfig = DEFAULT_SCORING,
): RiskAssessment {
  const { spofThreshold } = parseInput(riskOptionsSchema, options, "risk options");

  const highRiskTasks: HighRiskTask[] = [];
  const orphanedTasks: string[] = [];

  for (const id of snapshot.ids) {
    checkAborted(options);
    const item = snapshot.getNode(id);
    if (item.status === "done") continue;

    const blocks = snapshot.blocks(id);
    const blockedBy = snapshot.blockedBy(id);

    if (blocks.size === 0 && blockedBy.size === 0 && !snapshot.parentLinked.has(id)) {
      orphanedTasks.push(id);
    }

    if (blocks.size < spofThreshold) continue;

    const riskFactors: RiskFactor[] = [
      {
        severity: blocks.size >= 2 * spofThreshold ? "high" : "medium",
        description: `single point of failure — blocks ${blocks.size} tasks`,
        mitigation: `Start ${id} early or split it so its ${blocks.size} dependents are not held up`,
      },
    ];
    const important = item.priority === "high" || item.priority === "critical";
    const waitingOn = [...blockedBy].filter((blocker) => !snapshot.isDone(blocker)).sort(compareIds);
    if (important && waitingOn.length > 0) {
      riskFactors.push({
        severity: "high",
        description: "high-priority work is itself blocked",
        mitigation: `Finish its blockers first: ${waitingOn.join(", ")}`,
      });
    }

    highRiskTasks.push({
      id,
      title: item.title,
      priority: item.priority,
      riskScore: blocks.size * priorityWeight(item.priority, scoring),
      riskFactors,
    });
  }

  highRiskTasks.sort((a, b) => b.riskScore - a.riskScore || compareIds(a.id, b.id));

  const circularDependencies = findCycles(snapshot, options);

  const recommendations = [
    ...highRiskTasks.map((task) => {
      const waiting = `Prioritize ${task.id} (${task.title}): ${snapshot.blocks(task.id).size} tasks wait on it`;
      return task.riskFactors.length > 1 ? `${waiting}; clear its own blockers first` : waiting;
    }),
    ...circularDependencies.map(
      (cycle) => `Break the circular dependency ${[...cycle, cycle[0]].join(" -> ")} by removing one blocks edge`,
    ),
  ];

  return { highRiskTasks, circularDependencies, orphanedTasks, recommendations };
}
