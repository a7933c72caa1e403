import { z } from "zod";
import type { Priority } from "../graph/types.js";

export const priorityWeightsSchema = z.object({
  critical: z.number().nonnegative().default(4),
  high: z.number().nonnegative().default(3),
  medium: z.number().nonnegative().default(2),
  low: z.number().nonnegative().default(1),
});

/**
 * Coefficients behind bottleneck impact and recommendation scores. The
 * defaults are a fixed, testable choice; deployments tune them through
 * `.workgraph.json`.
 */
export const scoringConfigSchema = z.object({
  priorityWeights: priorityWeightsSchema.default({}),
  /** Multiplier for dependents reached only transitively. */
  transitiveFactor: z.number().nonnegative().default(0.5),
  priorityCoefficient: z.number().nonnegative().default(10),
  unlockCoefficient: z.number().nonnegative().default(2),
  /** Hours of estimated effort per point of penalty. */
  effortDivisor: z.number().positive().default(4),
  maxEffortPenalty: z.number().nonnegative().default(5),
});

export type ScoringConfig = z.infer<typeof scoringConfigSchema>;

export const DEFAULT_SCORING: ScoringConfig = scoringConfigSchema.parse({});

export function priorityWeight(priority: Priority, scoring: ScoringConfig = DEFAULT_SCORING): number {
  switch (priority) {
    case "critical":
      return scoring.priorityWeights.critical;
    case "high":
      return scoring.priorityWeights.high;
    case "medium":
      return scoring.priorityWeights.medium;
    case "low":
      return scoring.priorityWeights.low;
  }
}

export function effortPenalty(hours: number | undefined, scoring: ScoringConfig = DEFAULT_SCORING): number {
  if (hours === undefined) return 0;
  return Math.min(scoring.maxEffortPenalty, hours / scoring.effortDivisor);
}
