import { resolve } from "node:path";
import { loadConfig } from "./config/loader.js";
import { DependencyAnalytics } from "./analytics/index.js";
import { WorkItemStore } from "./store/store.js";
import type { GraphIndex } from "./graph/graph-index.js";
import type { AnalyticsCallOptions } from "./analytics/types.js";
import type { WorkGraphConfig } from "./types.js";

/** Everything a surface (CLI, server, script) needs, wired from one project dir. */
export interface WorkGraph {
  projectDir: string;
  dataDir: string;
  config: WorkGraphConfig;
  store: WorkItemStore;
  index: GraphIndex;
  analytics: DependencyAnalytics;
  /** Cancellation for one analytics call, honouring config.timeoutMs. */
  callOptions(): AnalyticsCallOptions;
}

export interface OpenWorkGraphOptions {
  /** Use this config instead of reading .workgraph.json. */
  config?: WorkGraphConfig;
  /** Fail on dangling edges when the index has to be rebuilt. Defaults to true. */
  strict?: boolean;
}

export async function openWorkGraph(
  projectDir: string = process.cwd(),
  options: OpenWorkGraphOptions = {},
): Promise<WorkGraph> {
  const resolvedConfig = options.config ?? (await loadConfig(projectDir));
  const dataDir = resolve(projectDir, resolvedConfig.dataDir);
  const store = await WorkItemStore.open(dataDir, { lock: resolvedConfig.lock, strict: options.strict });
  const analytics = new DependencyAnalytics(store.index, resolvedConfig.scoring);

  return {
    projectDir,
    dataDir,
    config: resolvedConfig,
    store,
    index: store.index,
    analytics,
    callOptions: () =>
      resolvedConfig.timeoutMs === undefined ? {} : { deadline: Date.now() + resolvedConfig.timeoutMs },
  };
}
