import type { z } from "zod";
import type { workgraphConfigSchema } from "./config/schema.js";

/** Resolved .workgraph.json, with every default filled in. */
export type WorkGraphConfig = z.infer<typeof workgraphConfigSchema>;

export type AnalyticsDefaults = WorkGraphConfig["defaults"];
