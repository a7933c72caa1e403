import { transitiveBlockedFrom } from "./traversal.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type { AnalyticsCallOptions, ImpactAnalysis } from "./types.js";

/**
 * Downstream effect of completing one item. Throws NotFoundError for ids
 * missing from the snapshot.
 */
export function analyzeImpact(
  snapshot: GraphSnapshot,
  nodeId: string,
  options: AnalyticsCallOptions = {},
): ImpactAnalysis {
  snapshot.getNode(nodeId);

  const affectedNodes = transitiveBlockedFrom(snapshot, nodeId, options);
  const totalImpact = affectedNodes.length;

  return {
    nodeId,
    directDependents: snapshot.blocks(nodeId).size,
    totalImpact,
    completionImpact: (totalImpact / Math.max(1, snapshot.openCount - 1)) * 100,
    affectedNodes,
  };
}
