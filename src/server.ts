import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { resolve } from "node:path";
import { openWorkGraph } from "./workgraph.js";
import { workItemStatusEnum } from "./graph/schemas.js";
import { formatJsonReport } from "./reporter/json.js";

const projectDirArg = z.string().optional().describe("Project directory (defaults to the server's project)");

function textResult(result: unknown) {
  return {
    content: [{ type: "text" as const, text: formatJsonReport(result) }],
  };
}

/**
 * Create an MCP server exposing the dependency analytics as tools.
 * Exported for testing; call `startServer()` to run with stdio transport.
 */
export function createServer(defaultProjectDir: string = process.cwd()): McpServer {
  const server = new McpServer(
    { name: "workgraph", version: "0.1.0" },
    { capabilities: { tools: {} } },
  );

  const open = (projectDir: string | undefined, strict?: boolean) =>
    openWorkGraph(projectDir === undefined ? defaultProjectDir : resolve(defaultProjectDir, projectDir), { strict });

  server.tool(
    "workgraph_find_bottlenecks",
    "Unfinished work items that block the most other work, ranked by weighted impact",
    {
      projectDir: projectDirArg,
      topN: z.number().int().nonnegative().optional().describe("Number of results"),
      minImpact: z.number().int().nonnegative().optional().describe("Minimum directly blocked items"),
    },
    async ({ projectDir, topN, minImpact }) => {
      const graph = await open(projectDir);
      return textResult(
        graph.analytics.findBottlenecks({
          topN: topN ?? graph.config.defaults.topN,
          minImpact: minImpact ?? graph.config.defaults.minImpact,
          ...graph.callOptions(),
        }),
      );
    },
  );

  server.tool(
    "workgraph_get_parallel_work",
    "Items that can be worked on in parallel now, dependency levels and agent assignments",
    {
      projectDir: projectDirArg,
      maxAgents: z.number().int().nonnegative().optional().describe("Maximum number of agents"),
      statusFilter: workItemStatusEnum.optional().describe("Status to report (default: todo)"),
    },
    async ({ projectDir, maxAgents, statusFilter }) => {
      const graph = await open(projectDir);
      return textResult(
        graph.analytics.getParallelWork({
          maxAgents: maxAgents ?? graph.config.defaults.maxAgents,
          statusFilter,
          ...graph.callOptions(),
        }),
      );
    },
  );

  server.tool(
    "workgraph_recommend_next_work",
    "Rank the todo items whose blockers are all done and group the top ones that can run in parallel",
    {
      projectDir: projectDirArg,
      agentCount: z.number().int().nonnegative().optional().describe("Number of agents to feed"),
      lookahead: z.number().int().nonnegative().optional().describe("Minimum number of recommendations"),
    },
    async ({ projectDir, agentCount, lookahead }) => {
      const graph = await open(projectDir);
      return textResult(
        graph.analytics.planNextWork({
          agentCount,
          lookahead: lookahead ?? graph.config.defaults.lookahead,
          ...graph.callOptions(),
        }),
      );
    },
  );

  server.tool(
    "workgraph_assess_risks",
    "Single points of failure, circular dependencies and orphaned work",
    {
      projectDir: projectDirArg,
      spofThreshold: z.number().int().positive().optional().describe("Direct dependents that make a single point of failure"),
    },
    async ({ projectDir, spofThreshold }) => {
      const graph = await open(projectDir);
      return textResult(
        graph.analytics.assessRisks({
          spofThreshold: spofThreshold ?? graph.config.defaults.spofThreshold,
          ...graph.callOptions(),
        }),
      );
    },
  );

  server.tool(
    "workgraph_analyze_impact",
    "What completing one work item unblocks downstream",
    {
      projectDir: projectDirArg,
      nodeId: z.string().min(1).describe("Work item id"),
    },
    async ({ projectDir, nodeId }) => {
      const graph = await open(projectDir);
      return textResult(graph.analytics.analyzeImpact(nodeId, graph.callOptions()));
    },
  );

  server.tool(
    "workgraph_reindex",
    "Rebuild the graph index from the work item documents",
    {
      projectDir: projectDirArg,
      strict: z.boolean().optional().describe("Fail on dangling edges instead of dropping them (default: true)"),
    },
    async ({ projectDir, strict }) => {
      const graph = await open(projectDir, strict ?? true);
      return textResult(await graph.store.reindex({ strict: strict ?? true }));
    },
  );

  return server;
}

/** Start the MCP server on stdio transport. */
async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

// Run when executed directly
const isMain =
  typeof process !== "undefined" &&
  process.argv[1] &&
  (process.argv[1].endsWith("/server.js") || process.argv[1].endsWith("\\server.js"));

if (isMain) {
  startServer().catch((err) => {
    process.stderr.write(`[workgraph] MCP server error: ${String(err)}\n`);
    process.exit(1);
  });
}
