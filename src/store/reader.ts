import { access, readFile, readdir } from "node:fs/promises";
import { parse as yamlParse } from "yaml";
import { parseDocument } from "./document.js";
import { itemPath, itemsDir, retiredPath } from "./paths.js";
import { retiredIdsSchema } from "../graph/schemas.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { isNotFound } from "../utils/platform.js";
import { compareIds } from "../graph/graph-index.js";
import type { WorkItemDocument } from "../graph/types.js";

/** Load one document by id. Throws NotFoundError when the file is absent. */
export async function loadDocument(dataDir: string, id: string): Promise<WorkItemDocument> {
  const path = itemPath(dataDir, id);
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) throw new NotFoundError(id);
    throw err;
  }
  const doc = parseDocument(raw, path);
  if (doc.item.id !== id) {
    throw new ValidationError(`${path}: frontmatter id "${doc.item.id}" does not match file name`, {
      source: path,
      id: doc.item.id,
    });
  }
  return doc;
}

/** Load every document in the items directory, sorted by id. */
export async function loadAllDocuments(dataDir: string): Promise<WorkItemDocument[]> {
  let entries: string[];
  try {
    entries = await readdir(itemsDir(dataDir));
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const docs: WorkItemDocument[] = [];
  for (const entry of entries) {
    if (!entry.endsWith(".md")) continue;
    const id = entry.slice(0, -".md".length);
    try {
      docs.push(await loadDocument(dataDir, id));
    } catch (err) {
      // Removed between readdir and read.
      if (err instanceof NotFoundError) continue;
      throw err;
    }
  }
  return docs.sort((a, b) => compareIds(a.item.id, b.item.id));
}

/** Ids that were deleted and may not be issued again. */
export async function loadRetiredIds(dataDir: string): Promise<Set<string>> {
  let raw: string;
  try {
    raw = await readFile(retiredPath(dataDir), "utf-8");
  } catch (err) {
    if (isNotFound(err)) return new Set();
    throw err;
  }
  const parsed = retiredIdsSchema.parse(yamlParse(raw) ?? {});
  return new Set(parsed.retired);
}

/** Fast existence check without parsing. */
export async function documentExists(dataDir: string, id: string): Promise<boolean> {
  try {
    await access(itemPath(dataDir, id));
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}
