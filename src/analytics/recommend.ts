import { z } from "zod";
import { compareIds } from "../graph/graph-index.js";
import { DEFAULT_SCORING, effortPenalty, priorityWeight, type ScoringConfig } from "./weights.js";
import { readyNow } from "./parallel.js";
import { Reachability, checkAborted } from "./traversal.js";
import { parseInput } from "../utils/validate.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type { WorkItem } from "../graph/types.js";
import type { AnalyticsCallOptions, Recommendation, WorkPlan } from "./types.js";

export const recommendOptionsSchema = z.object({
  agentCount: z.number().int().nonnegative().default(1),
  lookahead: z.number().int().nonnegative().default(5),
});

export type RecommendOptions = z.input<typeof recommendOptionsSchema> & AnalyticsCallOptions;

/** Effort at or below which an item counts as a quick win. */
const QUICK_WIN_HOURS = 4;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function explain(snapshot: GraphSnapshot, item: WorkItem, unlocksCount: number): string[] {
  const reasons: string[] = [];

  switch (item.priority) {
    case "critical":
      reasons.push("critical priority");
      break;
    case "high":
      reasons.push("high priority");
      break;
    case "medium":
    case "low":
      break;
  }

  if (unlocksCount > 0) {
    reasons.push(`unblocks ${plural(unlocksCount, "task")}`);
  }

  if (item.estimatedEffortHours !== undefined && item.estimatedEffortHours <= QUICK_WIN_HOURS) {
    reasons.push(`quick win (~${item.estimatedEffortHours}h)`);
  }

  reasons.push(snapshot.blockedBy(item.id).size === 0 ? "ready to start now" : "all blockers resolved");
  return reasons;
}

/**
 * Rank truly unblocked todo items:
 * priorityCoefficient × weight + unlockCoefficient × direct dependents − effort penalty.
 *
 * Ordered by score desc, unlocks desc, id asc; returns max(agentCount, lookahead) records.
 */
export function recommendNextWork(
  snapshot: GraphSnapshot,
  options: RecommendOptions = {},
  scoring: ScoringConfig = DEFAULT_SCORING,
): Recommendation[] {
  const { agentCount, lookahead } = parseInput(recommendOptionsSchema, options, "recommendation options");
  const recommendations: Recommendation[] = [];

  for (const id of readyNow(snapshot, "todo")) {
    checkAborted(options);
    const item = snapshot.getNode(id);
    const unlocks = [...snapshot.blocks(id)].sort(compareIds);
    const score =
      scoring.priorityCoefficient * priorityWeight(item.priority, scoring) +
      scoring.unlockCoefficient * unlocks.length -
      effortPenalty(item.estimatedEffortHours, scoring);

    recommendations.push({
      id,
      title: item.title,
      priority: item.priority,
      score,
      reasons: explain(snapshot, item, unlocks.length),
      estimatedHours: item.estimatedEffortHours ?? null,
      unlocksCount: unlocks.length,
      unlocks,
    });
  }

  recommendations.sort(
    (a, b) => b.score - a.score || b.unlocksCount - a.unlocksCount || compareIds(a.id, b.id),
  );

  return recommendations.slice(0, Math.max(agentCount, lookahead));
}

/**
 * Group the top `agentCount` recommendations so that no two items in a group
 * are connected by a `blocks` path (done items passed through). Greedy, in
 * ranking order; only groups of two or more are returned.
 */
export function suggestParallelWork(
  snapshot: GraphSnapshot,
  recommendations: Recommendation[],
  agentCount: number,
  cancel: AnalyticsCallOptions = {},
): string[][] {
  if (agentCount < 2) return [];
  const top = recommendations.slice(0, agentCount).map((rec) => rec.id);
  if (top.length < 2) return [];

  const reach = new Reachability(snapshot, cancel);
  const reachable = new Map(top.map((id) => [id, reach.reachable(id)]));
  const independent = (a: string, b: string): boolean =>
    !reachable.get(a)?.has(b) && !reachable.get(b)?.has(a);

  const groups: string[][] = [];
  for (const id of top) {
    checkAborted(cancel);
    const group = groups.find((members) => members.every((other) => independent(id, other)));
    if (group) {
      group.push(id);
    } else {
      groups.push([id]);
    }
  }
  return groups.filter((group) => group.length > 1);
}

/** recommendNextWork plus the parallel groups among its top `agentCount` records. */
export function planNextWork(
  snapshot: GraphSnapshot,
  options: RecommendOptions = {},
  scoring: ScoringConfig = DEFAULT_SCORING,
): WorkPlan {
  const recommendations = recommendNextWork(snapshot, options, scoring);
  const { agentCount } = parseInput(recommendOptionsSchema, options, "recommendation options");
  return {
    recommendations,
    parallelSuggestions: suggestParallelWork(snapshot, recommendations, agentCount, options),
  };
}
