import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { parse as yamlParse, stringify as yamlStringify } from "yaml";
import { indexCacheSchema, type IndexCacheFile } from "./schemas.js";
import { GraphIndex } from "./graph-index.js";
import { indexCachePath, itemsDir } from "../store/paths.js";
import { atomicWriteFile, isNotFound } from "../utils/platform.js";
import { errorMessage } from "../errors.js";
import type { DocumentSource } from "./types.js";

/** file name → "mtimeMs:size" for every item document. */
export type Manifest = Record<string, string>;

/** Stat every document in the items directory. Cheap: no file is parsed. */
export async function readManifest(dataDir: string): Promise<Manifest> {
  const dir = itemsDir(dataDir);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return {};
    throw err;
  }

  const manifest: Manifest = {};
  for (const entry of entries.filter((e) => e.endsWith(".md")).sort()) {
    try {
      const info = await stat(join(dir, entry));
      manifest[entry] = `${Math.trunc(info.mtimeMs)}:${info.size}`;
    } catch (err) {
      // Deleted between readdir and stat.
      if (!isNotFound(err)) throw err;
    }
  }
  return manifest;
}

function sameManifest(a: Manifest, b: Manifest): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => a[key] === b[key]);
}

/** Write the index contents and the manifest they were derived from to _index.yaml. */
export async function saveIndexCache(dataDir: string, index: GraphIndex, manifest: Manifest): Promise<void> {
  const data = index.toJSON();
  const file: IndexCacheFile = {
    version: 1,
    generatedAt: new Date().toISOString(),
    manifest,
    nodes: data.nodes,
    edges: data.edges,
  };
  await atomicWriteFile(indexCachePath(dataDir), yamlStringify(file));
}

/** Load _index.yaml. Returns null when absent; throws when unreadable or invalid. */
export async function loadIndexCache(dataDir: string): Promise<IndexCacheFile | null> {
  let raw: string;
  try {
    raw = await readFile(indexCachePath(dataDir), "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  return indexCacheSchema.parse(yamlParse(raw));
}

export interface OpenedIndex {
  index: GraphIndex;
  /** "cache" when _index.yaml matched the documents, "rebuild" otherwise. */
  origin: "cache" | "rebuild";
  manifest: Manifest;
}

/**
 * Open the index for a data dir: reuse _index.yaml when its manifest matches
 * the documents on disk, otherwise rebuild from the documents and rewrite
 * the cache.
 */
export async function openIndex(
  dataDir: string,
  source: DocumentSource,
  options: { strict?: boolean } = {},
): Promise<OpenedIndex> {
  const manifest = await readManifest(dataDir);

  try {
    const cached = await loadIndexCache(dataDir);
    if (cached && sameManifest(cached.manifest, manifest)) {
      const index = GraphIndex.fromData({ nodes: cached.nodes, edges: cached.edges });
      return { index, origin: "cache", manifest };
    }
    if (cached) {
      console.warn("[workgraph] Index cache is stale — rebuilding from documents");
    }
  } catch (err) {
    console.warn(`[workgraph] Index cache unreadable (${errorMessage(err)}) — rebuilding from documents`);
  }

  // Stamps taken before the scan: a document rewritten mid-scan then fails
  // the next manifest check instead of hiding behind a fresh stamp.
  const index = new GraphIndex();
  await index.rebuild(source, options);
  await saveIndexCache(dataDir, index, manifest);
  return { index, origin: "rebuild", manifest };
}
