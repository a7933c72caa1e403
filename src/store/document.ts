import { parse as yamlParse, stringify as yamlStringify } from "yaml";
import { documentFrontmatterSchema } from "../graph/schemas.js";
import { ValidationError } from "../errors.js";
import type { WorkItemDocument } from "../graph/types.js";

/** Parse YAML frontmatter from a markdown file. Returns frontmatter object and body string. */
function parseFrontmatter(content: string): { frontmatter: unknown; body: string } {
  const normalized = content.replace(/\r\n/g, "\n");
  if (!normalized.startsWith("---\n")) {
    throw new Error("Missing YAML frontmatter opening ---");
  }
  const end = normalized.indexOf("\n---\n", 3);
  const closing = end === -1 && normalized.endsWith("\n---") ? normalized.length - 4 : end;
  if (closing === -1) {
    throw new Error("Missing YAML frontmatter closing ---");
  }
  const yamlStr = normalized.slice(4, closing);
  const body = normalized.slice(closing + 5).trim();
  return { frontmatter: yamlParse(yamlStr), body };
}

/**
 * Parse an item document. `source` names the file in error messages.
 * Throws ValidationError on malformed frontmatter or unknown enum values.
 */
export function parseDocument(content: string, source: string): WorkItemDocument {
  let parsedFrontmatter: { frontmatter: unknown; body: string };
  try {
    parsedFrontmatter = parseFrontmatter(content);
  } catch (err) {
    throw new ValidationError(`${source}: ${err instanceof Error ? err.message : String(err)}`, { source });
  }

  const result = documentFrontmatterSchema.safeParse(parsedFrontmatter.frontmatter);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new ValidationError(`${source}: ${issue?.message ?? "invalid frontmatter"}${where}`, {
      source,
      issues: result.error.issues,
    });
  }

  const { blocks, parentOf, ...item } = result.data;
  if (Date.parse(item.updatedAt) < Date.parse(item.createdAt)) {
    throw new ValidationError(`${source}: updatedAt is earlier than createdAt`, { source });
  }

  return {
    item,
    blocks: [...new Set(blocks)],
    parentOf: [...new Set(parentOf)],
    body: parsedFrontmatter.body,
  };
}

/** Serialize a document to YAML frontmatter + markdown body. */
export function serializeDocument(doc: WorkItemDocument): string {
  const { item } = doc;
  const frontmatter: Record<string, unknown> = {
    id: item.id,
    title: item.title,
    status: item.status,
    priority: item.priority,
    type: item.type,
  };
  if (item.estimatedEffortHours !== undefined) {
    frontmatter.estimatedEffortHours = item.estimatedEffortHours;
  }
  frontmatter.createdAt = item.createdAt;
  frontmatter.updatedAt = item.updatedAt;
  frontmatter.blocks = [...doc.blocks].sort();
  frontmatter.parentOf = [...doc.parentOf].sort();

  const body = doc.body.trim();
  return `---\n${yamlStringify(frontmatter)}---\n${body ? `\n${body}\n` : ""}`;
}
