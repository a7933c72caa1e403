import { findBottlenecks, type BottleneckOptions } from "./bottlenecks.js";
import { getParallelWork, type ParallelWorkOptions } from "./parallel.js";
import { planNextWork, recommendNextWork, type RecommendOptions } from "./recommend.js";
import { assessRisks, type RiskOptions } from "./risk.js";
import { analyzeImpact } from "./impact.js";
import { DEFAULT_SCORING, type ScoringConfig } from "./weights.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type {
  AnalyticsCallOptions,
  Bottleneck,
  ImpactAnalysis,
  ParallelWork,
  Recommendation,
  RiskAssessment,
  WorkPlan,
} from "./types.js";

/** Anything that can hand out immutable snapshots, typically a GraphIndex. */
export interface SnapshotSource {
  snapshot(): GraphSnapshot;
}

/**
 * Stable entry point for presentation layers. Each call takes a fresh
 * snapshot from the index handle it was constructed with, then runs the
 * matching pure function over it.
 */
export class DependencyAnalytics {
  constructor(
    private readonly source: SnapshotSource,
    readonly scoring: ScoringConfig = DEFAULT_SCORING,
  ) {}

  findBottlenecks(options?: BottleneckOptions): Bottleneck[] {
    return findBottlenecks(this.source.snapshot(), options, this.scoring);
  }

  getParallelWork(options?: ParallelWorkOptions): ParallelWork {
    return getParallelWork(this.source.snapshot(), options, this.scoring);
  }

  recommendNextWork(options?: RecommendOptions): Recommendation[] {
    return recommendNextWork(this.source.snapshot(), options, this.scoring);
  }

  /** Recommendations plus the groups among the top `agentCount` that can run in parallel. */
  planNextWork(options?: RecommendOptions): WorkPlan {
    return planNextWork(this.source.snapshot(), options, this.scoring);
  }

  assessRisks(options?: RiskOptions): RiskAssessment {
    return assessRisks(this.source.snapshot(), options, this.scoring);
  }

  analyzeImpact(nodeId: string, options?: AnalyticsCallOptions): ImpactAnalysis {
    return analyzeImpact(this.source.snapshot(), nodeId, options);
  }
}

export { findBottlenecks, getParallelWork, recommendNextWork, assessRisks, analyzeImpact };
export { planNextWork, suggestParallelWork } from "./recommend.js";
export { computeLayers, readyNow } from "./parallel.js";
export { Reachability, findCycles, stronglyConnectedComponents, transitiveBlockedFrom } from "./traversal.js";
export { DEFAULT_SCORING, priorityWeight, effortPenalty, scoringConfigSchema } from "./weights.js";
export type { ScoringConfig } from "./weights.js";
export type { BottleneckOptions, ParallelWorkOptions, RecommendOptions, RiskOptions };
export type * from "./types.js";
