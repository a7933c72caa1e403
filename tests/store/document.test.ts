import { describe, it, expect } from "vitest";
import { parse as yamlParse } from "yaml";
import { parseDocument, serializeDocument } from "../../src/store/document.js";
import { ValidationError } from "../../src/errors.js";
import type { WorkItemDocument } from "../../src/graph/types.js";
import { makeItem } from "../analytics/fixtures.js";

const LEGACY = [
  "---",
  "id: auth-1",
  "title: Add login",
  "status: in_progress",
  "createdAt: 2026-01-05T09:00:00Z",
  "updatedAt: 2026-01-06T09:00:00Z",
  "blocks: [auth-2, auth-2, auth-3]",
  "---",
  "",
  "## Notes",
  "Use the session cookie.",
  "",
].join("\n");

describe("parseDocument", () => {
  it("normalizes legacy statuses and fills defaults", () => {
    const doc = parseDocument(LEGACY, "auth-1.md");
    expect(doc.item).toEqual({
      id: "auth-1",
      title: "Add login",
      status: "in-progress",
      priority: "medium",
      type: "feature",
      createdAt: "2026-01-05T09:00:00Z",
      updatedAt: "2026-01-06T09:00:00Z",
    });
    expect(doc.blocks).toEqual(["auth-2", "auth-3"]);
    expect(doc.parentOf).toEqual([]);
    expect(doc.body).toBe("## Notes\nUse the session cookie.");
  });

  it("accepts CRLF line endings", () => {
    const doc = parseDocument(LEGACY.replace(/\n/g, "\r\n"), "auth-1.md");
    expect(doc.item.id).toBe("auth-1");
    expect(doc.body).toBe("## Notes\nUse the session cookie.");
  });

  it("accepts a document with no body", () => {
    const doc = parseDocument("---\nid: a\ntitle: T\nstatus: todo\ncreatedAt: 2026-01-05T09:00:00Z\nupdatedAt: 2026-01-05T09:00:00Z\n---", "a.md");
    expect(doc.body).toBe("");
  });

  it("rejects missing frontmatter", () => {
    expect(() => parseDocument("# Just markdown\n", "x.md")).toThrow(
      new ValidationError("x.md: Missing YAML frontmatter opening ---"),
    );
  });

  it("rejects unknown enum values with the field path", () => {
    const content = LEGACY.replace("status: in_progress", "status: in_progress\npriority: urgent");
    expect(() => parseDocument(content, "auth-1.md")).toThrow(/^auth-1\.md: .* at priority$/);
  });

  it("rejects updatedAt before createdAt", () => {
    const content = LEGACY.replace("updatedAt: 2026-01-06T09:00:00Z", "updatedAt: 2026-01-04T09:00:00Z");
    expect(() => parseDocument(content, "auth-1.md")).toThrow("auth-1.md: updatedAt is earlier than createdAt");
  });
});

describe("serializeDocument", () => {
  const doc: WorkItemDocument = {
    item: makeItem("a", { title: "Write docs", priority: "high", estimatedEffortHours: 3 }),
    blocks: ["c", "b"],
    parentOf: [],
    body: "Some notes\n\n",
  };

  it("writes frontmatter keys in a fixed order with sorted edge lists", () => {
    const text = serializeDocument(doc);
    expect(text.startsWith("---\nid: a\ntitle: Write docs\nstatus: todo\npriority: high\ntype: feature\n")).toBe(true);

    const yamlPart = text.slice(4, text.indexOf("\n---\n") + 1);
    const frontmatter: unknown = yamlParse(yamlPart);
    expect(frontmatter).toEqual({
      id: "a",
      title: "Write docs",
      status: "todo",
      priority: "high",
      type: "feature",
      estimatedEffortHours: 3,
      createdAt: "2026-01-05T09:00:00.000Z",
      updatedAt: "2026-01-05T09:00:00.000Z",
      blocks: ["b", "c"],
      parentOf: [],
    });
  });

  it("separates a trimmed body with a blank line", () => {
    expect(serializeDocument(doc).endsWith("---\n\nSome notes\n")).toBe(true);
    expect(serializeDocument({ ...doc, body: "" }).endsWith("parentOf: []\n---\n")).toBe(true);
  });

  it("parses back to the same document", () => {
    expect(parseDocument(serializeDocument(doc), "a.md")).toEqual({ ...doc, blocks: ["b", "c"], body: "Some notes" });
  });
});
