import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { workgraphConfigSchema } from "./schema.js";
import { isNotFound } from "../utils/platform.js";
import type { WorkGraphConfig } from "../types.js";

export const CONFIG_FILE = ".workgraph.json";

/** Load .workgraph.json from the project root; a missing file means defaults. */
export async function loadConfig(
  projectDir: string = process.cwd(),
): Promise<WorkGraphConfig> {
  let raw: unknown = {};

  try {
    const content = await readFile(join(projectDir, CONFIG_FILE), "utf-8");
    raw = JSON.parse(content);
  } catch (err: unknown) {
    if (!isNotFound(err)) throw err;
    // No config file: use defaults
  }

  return workgraphConfigSchema.parse(raw);
}
