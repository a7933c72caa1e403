#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { existsSync, readFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { CONFIG_FILE, loadConfig } from "./config/loader.js";
import { openWorkGraph, type OpenWorkGraphOptions, type WorkGraph } from "./workgraph.js";
import { itemsDir } from "./store/paths.js";
import { errorMessage } from "./errors.js";
import {
  createItemInputSchema,
  updateItemPatchSchema,
  workItemStatusSchema,
} from "./graph/schemas.js";
import { parseInput } from "./utils/validate.js";
import type { EdgeKind } from "./graph/types.js";
import {
  formatBottlenecks,
  formatDocument,
  formatImpact,
  formatParallelWork,
  formatRebuild,
  formatRecommendations,
  formatRisks,
} from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";

/** Directory holding our package.json, both from src/ and from dist/src/. */
function getPackageRoot(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) throw new Error("package.json not found above the CLI");
    dir = parent;
  }
  return dir;
}

const cliPkgVersion = JSON.parse(
  readFileSync(join(getPackageRoot(), "package.json"), "utf-8"),
).version as string;

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parseHours(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of hours.");
  }
  return parsed;
}

/** Run a command body, turning any failure into `Error: ...` and exit code 1. */
async function run(
  task: (graph: WorkGraph) => Promise<void> | void,
  options: OpenWorkGraphOptions = {},
): Promise<void> {
  try {
    const graph = await openWorkGraph(process.cwd(), options);
    await task(graph);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

function print(json: boolean | undefined, result: unknown, human: () => string): void {
  console.log(json ? formatJsonReport(result) : human());
}

const program = new Command();

program
  .name("workgraph")
  .description("workgraph — file-backed work items with dependency analytics")
  .version(cliPkgVersion);

// ── init command ───────────────────────────────────────────────────

program
  .command("init")
  .description("Create the data directory and a default .workgraph.json")
  .action(async () => {
    try {
      const projectDir = process.cwd();
      const configPath = join(projectDir, CONFIG_FILE);
      const created: string[] = [];

      if (!existsSync(configPath)) {
        await writeFile(configPath, JSON.stringify({ dataDir: ".workgraph" }, null, 2) + "\n", "utf-8");
        created.push(CONFIG_FILE);
      }

      const config = await loadConfig(projectDir);
      const dataDir = resolve(projectDir, config.dataDir);
      await mkdir(itemsDir(dataDir), { recursive: true });
      created.push(`${config.dataDir}/items/`);

      console.log(`## Workgraph Initialized`);
      for (const path of created) console.log(`  - ${path}`);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

// ── item commands ──────────────────────────────────────────────────

interface AddOptions {
  priority?: string;
  type?: string;
  effort?: number;
  body?: string;
}

program
  .command("add <id> <title>")
  .description("Create a work item in todo")
  .option("-p, --priority <priority>", "low | medium | high | critical")
  .option("-t, --type <type>", "feature | bug | track | epic")
  .option("-e, --effort <hours>", "Estimated effort in hours", parseHours)
  .option("-b, --body <markdown>", "Document body")
  .action((id: string, title: string, opts: AddOptions) =>
    run(async ({ store }) => {
      const input = parseInput(
        createItemInputSchema,
        { id, title, priority: opts.priority, type: opts.type, estimatedEffortHours: opts.effort, body: opts.body },
        "work item",
      );
      const item = await store.createItem(input);
      console.log(`Created ${item.id} (${item.priority} ${item.type})`);
    }),
  );

interface UpdateOptions extends AddOptions {
  title?: string;
  status?: string;
  clearEffort?: boolean;
}

program
  .command("update <id>")
  .description("Change fields of a work item")
  .option("--title <title>", "New title")
  .option("-s, --status <status>", "todo | in-progress | blocked | done")
  .option("-p, --priority <priority>", "low | medium | high | critical")
  .option("-t, --type <type>", "feature | bug | track | epic")
  .option("-e, --effort <hours>", "Estimated effort in hours", parseHours)
  .option("--clear-effort", "Remove the effort estimate")
  .option("-b, --body <markdown>", "Replace the document body")
  .action((id: string, opts: UpdateOptions) =>
    run(async ({ store }) => {
      const patch = parseInput(
        updateItemPatchSchema,
        {
          title: opts.title,
          status: opts.status,
          priority: opts.priority,
          type: opts.type,
          estimatedEffortHours: opts.clearEffort ? null : opts.effort,
          body: opts.body,
        },
        "update",
      );
      const item = await store.updateItem(id, patch);
      console.log(`Updated ${item.id}: ${item.status}, ${item.priority}`);
    }),
  );

async function changeEdge(graph: WorkGraph, from: string, to: string, kind: EdgeKind, remove: boolean): Promise<void> {
  const arrow = `${from} -[${kind}]-> ${to}`;
  if (remove) {
    const removed = await graph.store.removeEdge(from, to, kind);
    console.log(removed ? `Removed ${arrow}` : `No edge ${arrow}`);
  } else {
    const added = await graph.store.addEdge(from, to, kind);
    console.log(added ? `Added ${arrow}` : `Already present: ${arrow}`);
  }
}

program
  .command("block <blocker> <blocked>")
  .description("Record that <blocked> cannot start until <blocker> is done")
  .action((blocker: string, blocked: string) => run((graph) => changeEdge(graph, blocker, blocked, "blocks", false)));

program
  .command("unblock <blocker> <blocked>")
  .description("Remove a blocks edge")
  .action((blocker: string, blocked: string) => run((graph) => changeEdge(graph, blocker, blocked, "blocks", true)));

program
  .command("parent <parent> <child>")
  .description("Record a parent_of link")
  .option("--remove", "Remove the link instead")
  .action((parent: string, child: string, opts: { remove?: boolean }) =>
    run((graph) => changeEdge(graph, parent, child, "parent_of", opts.remove ?? false)),
  );

program
  .command("remove <id>")
  .description("Delete an unreferenced work item; its id is retired")
  .action((id: string) =>
    run(async ({ store }) => {
      await store.deleteItem(id);
      console.log(`Removed ${id}`);
    }),
  );

program
  .command("show <id>")
  .description("Print one work item")
  .option("--json", "Output structured JSON")
  .action((id: string, opts: { json?: boolean }) =>
    run(async ({ store }) => {
      const doc = await store.getDocument(id);
      print(opts.json, doc, () => formatDocument(doc));
    }),
  );

program
  .command("reindex")
  .description("Rebuild the index cache from every document")
  .option("--lenient", "Drop dangling edges instead of failing")
  .option("--json", "Output structured JSON")
  .action((opts: { lenient?: boolean; json?: boolean }) =>
    run(async ({ store }) => {
      const report = await store.reindex({ strict: !opts.lenient });
      print(opts.json, report, () => formatRebuild(report));
    }, { strict: !opts.lenient }),
  );

// ── analytics commands ─────────────────────────────────────────────

program
  .command("bottlenecks")
  .description("Unfinished items that block the most work")
  .option("-n, --top <count>", "Number of results", parseCount)
  .option("--min-impact <count>", "Minimum directly blocked items", parseCount)
  .option("--json", "Output structured JSON")
  .action((opts: { top?: number; minImpact?: number; json?: boolean }) =>
    run((graph) => {
      const result = graph.analytics.findBottlenecks({
        topN: opts.top ?? graph.config.defaults.topN,
        minImpact: opts.minImpact ?? graph.config.defaults.minImpact,
        ...graph.callOptions(),
      });
      print(opts.json, result, () => formatBottlenecks(result));
    }),
  );

program
  .command("parallel")
  .description("Work that can proceed in parallel right now")
  .option("-a, --agents <count>", "Maximum number of agents", parseCount)
  .option("-s, --status <status>", "Status to report (default: todo)")
  .option("--json", "Output structured JSON")
  .action((opts: { agents?: number; status?: string; json?: boolean }) =>
    run((graph) => {
      const result = graph.analytics.getParallelWork({
        maxAgents: opts.agents ?? graph.config.defaults.maxAgents,
        statusFilter: opts.status === undefined ? undefined : parseInput(workItemStatusSchema, opts.status, "status"),
        ...graph.callOptions(),
      });
      print(opts.json, result, () => formatParallelWork(result));
    }),
  );

program
  .command("recommend")
  .description("Rank the ready todo items")
  .option("-a, --agents <count>", "Number of agents to feed", parseCount)
  .option("-l, --lookahead <count>", "Minimum number of recommendations", parseCount)
  .option("--json", "Output structured JSON")
  .action((opts: { agents?: number; lookahead?: number; json?: boolean }) =>
    run((graph) => {
      const result = graph.analytics.planNextWork({
        agentCount: opts.agents,
        lookahead: opts.lookahead ?? graph.config.defaults.lookahead,
        ...graph.callOptions(),
      });
      print(opts.json, result, () => formatRecommendations(result.recommendations, result.parallelSuggestions));
    }),
  );

program
  .command("risks")
  .description("Single points of failure, cycles and orphaned work")
  .option("--threshold <count>", "Direct dependents that make a single point of failure", parseCount)
  .option("--json", "Output structured JSON")
  .action((opts: { threshold?: number; json?: boolean }) =>
    run((graph) => {
      const result = graph.analytics.assessRisks({
        spofThreshold: opts.threshold ?? graph.config.defaults.spofThreshold,
        ...graph.callOptions(),
      });
      print(opts.json, result, () => formatRisks(result));
    }),
  );

program
  .command("impact <id>")
  .description("What finishing one item unblocks downstream")
  .option("--json", "Output structured JSON")
  .action((id: string, opts: { json?: boolean }) =>
    run((graph) => {
      const result = graph.analytics.analyzeImpact(id, graph.callOptions());
      print(opts.json, result, () => formatImpact(result));
    }),
  );

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
