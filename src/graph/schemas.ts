import { z } from "zod";

const LEGACY_STATUS: Record<string, string> = {
  in_progress: "in-progress",
  active: "in-progress",
  complete: "done",
  completed: "done",
};

export const workItemStatusEnum = z.enum(["todo", "in-progress", "blocked", "done"]);

/** Status with legacy spellings folded into the canonical values. */
export const workItemStatusSchema = z.preprocess(
  (value) =>
    typeof value === "string" ? (LEGACY_STATUS[value.toLowerCase()] ?? value.toLowerCase()) : value,
  workItemStatusEnum,
);

export const priorityEnum = z.enum(["low", "medium", "high", "critical"]);

export const workItemTypeEnum = z.enum(["feature", "bug", "track", "epic"]);

export const edgeKindEnum = z.enum(["blocks", "parent_of"]);

export const idSchema = z.string().min(1).regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, {
  message: "id may contain only letters, digits, '.', '_' and '-'",
});

export const workItemSchema = z
  .object({
    id: idSchema,
    title: z.string().min(1),
    status: workItemStatusSchema,
    priority: priorityEnum,
    type: workItemTypeEnum,
    estimatedEffortHours: z.number().nonnegative().optional(),
    createdAt: z.string().datetime({ offset: true }),
    updatedAt: z.string().datetime({ offset: true }),
  })
  .refine((item) => Date.parse(item.updatedAt) >= Date.parse(item.createdAt), {
    message: "updatedAt must not be earlier than createdAt",
    path: ["updatedAt"],
  });

export const edgeSchema = z.object({
  from: idSchema,
  to: idSchema,
  kind: edgeKindEnum,
});

/** Validates the YAML frontmatter of an item document. */
export const documentFrontmatterSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  status: workItemStatusSchema,
  priority: priorityEnum.default("medium"),
  type: workItemTypeEnum.default("feature"),
  estimatedEffortHours: z.number().nonnegative().optional(),
  createdAt: z.string().datetime({ offset: true }),
  updatedAt: z.string().datetime({ offset: true }),
  blocks: z.array(idSchema).default([]),
  parentOf: z.array(idSchema).default([]),
});

/** Validates the persisted index cache (_index.yaml). */
export const indexCacheSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  manifest: z.record(z.string(), z.string()),
  nodes: z.array(workItemSchema),
  edges: z.array(edgeSchema),
});

/** Validates retired.yaml: ids that may never be issued again. */
export const retiredIdsSchema = z.object({
  retired: z.array(idSchema).default([]),
});

export const createItemInputSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  priority: priorityEnum.default("medium"),
  type: workItemTypeEnum.default("feature"),
  estimatedEffortHours: z.number().nonnegative().optional(),
  body: z.string().default(""),
});

export const updateItemPatchSchema = z.object({
  title: z.string().min(1).optional(),
  status: workItemStatusSchema.optional(),
  priority: priorityEnum.optional(),
  type: workItemTypeEnum.optional(),
  estimatedEffortHours: z.number().nonnegative().nullable().optional(),
  body: z.string().optional(),
});

export type CreateItemInput = z.input<typeof createItemInputSchema>;
export type UpdateItemPatch = z.input<typeof updateItemPatchSchema>;
export type IndexCacheFile = z.infer<typeof indexCacheSchema>;
