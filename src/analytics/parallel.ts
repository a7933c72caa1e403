import { z } from "zod";
import { compareIds } from "../graph/graph-index.js";
import { workItemStatusEnum } from "../graph/schemas.js";
import { DEFAULT_SCORING, priorityWeight, type ScoringConfig } from "./weights.js";
import { Reachability, checkAborted } from "./traversal.js";
import { parseInput } from "../utils/validate.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type { WorkItemStatus } from "../graph/types.js";
import type { AgentAssignment, AnalyticsCallOptions, DependencyLevel, ParallelWork } from "./types.js";

export const parallelWorkOptionsSchema = z.object({
  maxAgents: z.number().int().nonnegative().default(5),
  statusFilter: workItemStatusEnum.default("todo"),
});

export type ParallelWorkOptions = z.input<typeof parallelWorkOptionsSchema> & AnalyticsCallOptions;

/**
 * Items with the given status whose blockers are all done: the first
 * layer of the peeling below, restricted to that status.
 */
export function readyNow(snapshot: GraphSnapshot, statusFilter: WorkItemStatus = "todo"): string[] {
  return snapshot.ids.filter((id) => {
    if (snapshot.getNode(id).status !== statusFilter) return false;
    for (const blocker of snapshot.blockedBy(id)) {
      if (!snapshot.isDone(blocker)) return false;
    }
    return true;
  });
}

/**
 * Kahn-style peeling of unfinished items. Layer k holds every item whose
 * blockers are done or sit in layers before k. Items that never peel off
 * are cycle members or wait on one.
 */
export function computeLayers(
  snapshot: GraphSnapshot,
  cancel: AnalyticsCallOptions = {},
): { layers: string[][]; unassigned: string[] } {
  const remaining = new Set(snapshot.ids.filter((id) => !snapshot.isDone(id)));
  const layers: string[][] = [];

  while (remaining.size > 0) {
    const layer: string[] = [];
    for (const id of remaining) {
      checkAborted(cancel);
      let ready = true;
      for (const blocker of snapshot.blockedBy(id)) {
        if (remaining.has(blocker)) {
          ready = false;
          break;
        }
      }
      if (ready) layer.push(id);
    }
    if (layer.length === 0) break;
    for (const id of layer) remaining.delete(id);
    layers.push(layer.sort(compareIds));
  }

  return { layers, unassigned: [...remaining].sort(compareIds) };
}

/** Round-robin the ready items over the agents, highest priority first. */
function assignAgents(
  snapshot: GraphSnapshot,
  ready: string[],
  maxAgents: number,
  scoring: ScoringConfig,
): AgentAssignment[] {
  const agentCount = Math.min(maxAgents, ready.length);
  if (agentCount === 0) return [];

  const ordered = [...ready].sort(
    (a, b) =>
      priorityWeight(snapshot.getNode(b).priority, scoring) -
        priorityWeight(snapshot.getNode(a).priority, scoring) || compareIds(a, b),
  );
  const assignments: AgentAssignment[] = Array.from({ length: agentCount }, (_, i) => ({
    agent: `agent-${i + 1}`,
    tasks: [],
  }));
  ordered.forEach((id, i) => assignments[i % agentCount].tasks.push(id));
  return assignments;
}

/**
 * What can be worked on in parallel right now, and how the remaining work
 * layers up behind it.
 */
export function getParallelWork(
  snapshot: GraphSnapshot,
  options: ParallelWorkOptions = {},
  scoring: ScoringConfig = DEFAULT_SCORING,
): ParallelWork {
  const { maxAgents, statusFilter } = parseInput(parallelWorkOptionsSchema, options, "parallel work options");
  const { layers, unassigned } = computeLayers(snapshot, options);

  const filtered = layers.map((layer) => layer.filter((id) => snapshot.getNode(id).status === statusFilter));
  const levels: DependencyLevel[] = [];
  filtered.forEach((nodes, level) => {
    if (nodes.length > 0) {
      levels.push({ level, nodes, maxParallel: Math.min(nodes.length, maxAgents) });
    }
  });

  const ready = filtered[0] ?? [];
  const widest = levels.reduce((max, level) => Math.max(max, level.nodes.length), 0);

  let cycleMembers: string[] = [];
  if (unassigned.length > 0) {
    const onCycle = new Reachability(snapshot, options).cycleMembers();
    cycleMembers = unassigned.filter((id) => onCycle.has(id));
  }

  return {
    maxParallelism: Math.min(widest, maxAgents),
    readyNow: ready,
    totalReady: ready.length,
    levelCount: levels.length,
    nextLevel: filtered[1] ?? [],
    levels,
    assignments: assignAgents(snapshot, ready, maxAgents, scoring),
    unassigned,
    cycleMembers,
  };
}
