import { join } from "node:path";

export function itemsDir(dataDir: string): string {
  return join(dataDir, "items");
}

export function itemPath(dataDir: string, id: string): string {
  return join(itemsDir(dataDir), `${id}.md`);
}

export function locksDir(dataDir: string): string {
  return join(dataDir, "locks");
}

export function lockPath(dataDir: string, name: string): string {
  return join(locksDir(dataDir), `${name}.lock`);
}

export function retiredPath(dataDir: string): string {
  return join(dataDir, "retired.yaml");
}

export function indexCachePath(dataDir: string): string {
  return join(dataDir, "_index.yaml");
}
