import { z } from "zod";
import { compareIds } from "../graph/graph-index.js";
import { DEFAULT_SCORING, priorityWeight, type ScoringConfig } from "./weights.js";
import { Reachability, checkAborted } from "./traversal.js";
import { parseInput } from "../utils/validate.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type { AnalyticsCallOptions, Bottleneck } from "./types.js";

export const bottleneckOptionsSchema = z.object({
  topN: z.number().int().nonnegative().default(5),
  /** Minimum number of directly blocked items. */
  minImpact: z.number().int().nonnegative().default(1),
});

export type BottleneckOptions = z.input<typeof bottleneckOptionsSchema> & AnalyticsCallOptions;

/**
 * Rank unfinished items by weighted impact:
 * Σ weight(direct dependents) + transitiveFactor × Σ weight(transitive-only dependents).
 *
 * Ordered by impact desc, transitive count desc, id asc.
 */
export function findBottlenecks(
  snapshot: GraphSnapshot,
  options: BottleneckOptions = {},
  scoring: ScoringConfig = DEFAULT_SCORING,
): Bottleneck[] {
  const { topN, minImpact } = parseInput(bottleneckOptionsSchema, options, "bottleneck options");
  const reach = new Reachability(snapshot, options);
  const results: Bottleneck[] = [];

  for (const id of snapshot.ids) {
    checkAborted(options);
    const item = snapshot.getNode(id);
    if (item.status === "done") continue;

    const direct = [...snapshot.blocks(id)].sort(compareIds);
    if (direct.length < minImpact) continue;

    const directSet = new Set(direct);
    const transitive = reach.transitiveBlocked(id);

    let impact = 0;
    for (const dep of direct) {
      impact += priorityWeight(snapshot.getNode(dep).priority, scoring);
    }
    for (const dep of transitive) {
      if (directSet.has(dep)) continue;
      impact += scoring.transitiveFactor * priorityWeight(snapshot.getNode(dep).priority, scoring);
    }

    results.push({
      id,
      title: item.title,
      status: item.status,
      priority: item.priority,
      blocksCount: direct.length,
      transitiveCount: transitive.length,
      impactScore: impact,
      blockedTasks: direct,
    });
  }

  results.sort(
    (a, b) =>
      b.impactScore - a.impactScore ||
      b.transitiveCount - a.transitiveCount ||
      compareIds(a.id, b.id),
  );

  return results.slice(0, topN);
}
