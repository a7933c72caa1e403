import type { Priority, WorkItemStatus } from "../graph/types.js";

/** A node whose completion unblocks disproportionately many others. */
export interface Bottleneck {
  id: string;
  title: string;
  status: WorkItemStatus;
  priority: Priority;
  /** Number of items this one directly blocks. */
  blocksCount: number;
  /** Number of unfinished items transitively waiting on this one. */
  transitiveCount: number;
  impactScore: number;
  /** Directly blocked ids, sorted. */
  blockedTasks: string[];
}

/** One topological generation, filtered to the requested status. */
export interface DependencyLevel {
  level: number;
  nodes: string[];
  maxParallel: number;
}

export interface AgentAssignment {
  agent: string;
  tasks: string[];
}

export interface ParallelWork {
  maxParallelism: number;
  readyNow: string[];
  totalReady: number;
  levelCount: number;
  nextLevel: string[];
  levels: DependencyLevel[];
  assignments: AgentAssignment[];
  /** Unfinished items never reached by layering: cycle members and their dependents. */
  unassigned: string[];
  /** The subset of `unassigned` that sits on a cycle. */
  cycleMembers: string[];
}

export interface Recommendation {
  id: string;
  title: string;
  priority: Priority;
  score: number;
  reasons: string[];
  estimatedHours: number | null;
  unlocksCount: number;
  unlocks: string[];
}

/** Recommendations plus groups of them that can be worked on side by side. */
export interface WorkPlan {
  recommendations: Recommendation[];
  /** Recommended ids with no `blocks` path between any two of them, in ranking order. */
  parallelSuggestions: string[][];
}

export type RiskSeverity = "medium" | "high";

export interface RiskFactor {
  severity: RiskSeverity;
  description: string;
  mitigation: string;
}

export interface HighRiskTask {
  id: string;
  title: string;
  priority: Priority;
  riskScore: number;
  riskFactors: RiskFactor[];
}

export interface RiskAssessment {
  highRiskTasks: HighRiskTask[];
  circularDependencies: string[][];
  orphanedTasks: string[];
  recommendations: string[];
}

export interface ImpactAnalysis {
  nodeId: string;
  directDependents: number;
  totalImpact: number;
  /** Share of the remaining work, in percent. */
  completionImpact: number;
  /** Unfinished ids transitively waiting on the node, sorted. */
  affectedNodes: string[];
}

/**
 * Cancellation every analytics call accepts. Both are checked between node
 * computations and end the call with AnalyticsAbortedError.
 */
export interface AnalyticsCallOptions {
  signal?: AbortSignal;
  /** Epoch milliseconds after which the call gives up. */
  deadline?: number;
}
