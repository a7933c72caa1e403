import { stat, unlink } from "node:fs/promises";
import { stringify as yamlStringify } from "yaml";
import { serializeDocument } from "./document.js";
import { itemPath, retiredPath } from "./paths.js";
import { atomicWriteFile } from "../utils/platform.js";
import type { WorkItemDocument } from "../graph/types.js";

/** Write a document atomically. Returns its manifest stamp ("mtimeMs:size"). */
export async function writeDocument(dataDir: string, doc: WorkItemDocument): Promise<string> {
  const path = itemPath(dataDir, doc.item.id);
  await atomicWriteFile(path, serializeDocument(doc));
  const info = await stat(path);
  return `${Math.trunc(info.mtimeMs)}:${info.size}`;
}

export async function removeDocument(dataDir: string, id: string): Promise<void> {
  await unlink(itemPath(dataDir, id));
}

export async function writeRetiredIds(dataDir: string, ids: Set<string>): Promise<void> {
  await atomicWriteFile(retiredPath(dataDir), yamlStringify({ retired: [...ids].sort() }));
}
