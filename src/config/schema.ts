import { z } from "zod";
import { scoringConfigSchema } from "../analytics/weights.js";

export const analyticsDefaultsSchema = z.object({
  topN: z.number().int().nonnegative().default(5),
  minImpact: z.number().int().nonnegative().default(1),
  maxAgents: z.number().int().nonnegative().default(5),
  lookahead: z.number().int().nonnegative().default(5),
  spofThreshold: z.number().int().positive().default(2),
});

export const lockConfigSchema = z.object({
  retries: z.number().int().positive().default(20),
  retryMs: z.number().int().positive().default(50),
  staleMs: z.number().int().positive().default(30_000),
});

export const workgraphConfigSchema = z.object({
  /** Data directory, relative to the project root. */
  dataDir: z.string().min(1).default(".workgraph"),
  scoring: scoringConfigSchema.default({}),
  defaults: analyticsDefaultsSchema.default({}),
  lock: lockConfigSchema.default({}),
  /** Deadline for a single analytics call made by the CLI or server. */
  timeoutMs: z.number().int().positive().optional(),
});

export type WorkGraphConfigInput = z.input<typeof workgraphConfigSchema>;
