import type {
  Bottleneck,
  ImpactAnalysis,
  ParallelWork,
  Recommendation,
  RiskAssessment,
} from "../analytics/types.js";
import type { RebuildReport, WorkItemDocument } from "../graph/types.js";

function formatScore(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function list(ids: string[]): string {
  return ids.length > 0 ? ids.join(", ") : "(none)";
}

export function formatBottlenecks(bottlenecks: Bottleneck[]): string {
  const lines: string[] = ["## Bottlenecks"];
  if (bottlenecks.length === 0) {
    lines.push("No bottlenecks found.");
    return lines.join("\n");
  }

  bottlenecks.forEach((b, i) => {
    lines.push(`${i + 1}. **${b.id}** ${b.title} [${b.priority}, ${b.status}]`);
    lines.push(`   Blocks ${b.blocksCount} directly, ${b.transitiveCount} transitively — impact ${formatScore(b.impactScore)}`);
    lines.push(`   Blocked: ${list(b.blockedTasks)}`);
  });
  return lines.join("\n");
}

export function formatParallelWork(work: ParallelWork): string {
  const lines: string[] = ["## Parallel Work"];
  lines.push(`**Max parallelism:** ${work.maxParallelism}`);
  lines.push(`**Ready now (${work.totalReady}):** ${list(work.readyNow)}`);
  lines.push(`**Next level:** ${list(work.nextLevel)}`);
  lines.push("");

  lines.push(`### Levels (${work.levelCount})`);
  for (const level of work.levels) {
    lines.push(`- Level ${level.level} (${level.maxParallel} parallel): ${level.nodes.join(", ")}`);
  }

  if (work.assignments.length > 0) {
    lines.push("");
    lines.push("### Suggested Assignments");
    for (const assignment of work.assignments) {
      lines.push(`- ${assignment.agent}: ${assignment.tasks.join(", ")}`);
    }
  }

  if (work.unassigned.length > 0) {
    lines.push("");
    lines.push("### Unassigned");
    lines.push(`- Waiting on a cycle: ${list(work.unassigned)}`);
    lines.push(`- Cycle members: ${list(work.cycleMembers)}`);
  }
  return lines.join("\n");
}

export function formatRecommendations(recommendations: Recommendation[], parallelSuggestions: string[][] = []): string {
  const lines: string[] = ["## Recommended Next Work"];
  if (recommendations.length === 0) {
    lines.push("Nothing is ready to start.");
    return lines.join("\n");
  }

  recommendations.forEach((rec, i) => {
    const effort = rec.estimatedHours === null ? "" : `, ~${rec.estimatedHours}h`;
    lines.push(`${i + 1}. **${rec.id}** ${rec.title} [${rec.priority}${effort}] — score ${formatScore(rec.score)}`);
    for (const reason of rec.reasons) {
      lines.push(`   - ${reason}`);
    }
  });

  if (parallelSuggestions.length > 0) {
    lines.push("");
    lines.push("### Parallel Suggestions");
    for (const group of parallelSuggestions) {
      lines.push(`- Work on ${group.join(" and ")} in parallel`);
    }
  }
  return lines.join("\n");
}

export function formatRisks(risks: RiskAssessment): string {
  const lines: string[] = ["## Risk Assessment"];

  lines.push(`### High-Risk Tasks (${risks.highRiskTasks.length})`);
  for (const task of risks.highRiskTasks) {
    lines.push(`- **${task.id}** ${task.title} [${task.priority}] — risk ${formatScore(task.riskScore)}`);
    for (const factor of task.riskFactors) {
      lines.push(`  > [${factor.severity}] ${factor.description}`);
      lines.push(`    Mitigation: ${factor.mitigation}`);
    }
  }
  lines.push("");

  lines.push(`### Circular Dependencies (${risks.circularDependencies.length})`);
  for (const cycle of risks.circularDependencies) {
    lines.push(`- ${[...cycle, cycle[0]].join(" -> ")}`);
  }
  lines.push("");

  lines.push(`### Orphaned Tasks (${risks.orphanedTasks.length})`);
  for (const id of risks.orphanedTasks) {
    lines.push(`- ${id}`);
  }

  if (risks.recommendations.length > 0) {
    lines.push("");
    lines.push("### Recommendations");
    for (const rec of risks.recommendations) {
      lines.push(`- ${rec}`);
    }
  }
  return lines.join("\n");
}

export function formatImpact(impact: ImpactAnalysis): string {
  return [
    `## Impact of ${impact.nodeId}`,
    `**Direct dependents:** ${impact.directDependents}`,
    `**Total impact:** ${impact.totalImpact}`,
    `**Completion impact:** ${impact.completionImpact.toFixed(1)}% of remaining work`,
    `**Affected:** ${list(impact.affectedNodes)}`,
  ].join("\n");
}

export function formatDocument(doc: WorkItemDocument): string {
  const { item } = doc;
  const lines = [
    `## ${item.id}: ${item.title}`,
    `**Status:** ${item.status}`,
    `**Priority:** ${item.priority}`,
    `**Type:** ${item.type}`,
  ];
  if (item.estimatedEffortHours !== undefined) {
    lines.push(`**Effort:** ${item.estimatedEffortHours}h`);
  }
  lines.push(`**Blocks:** ${list(doc.blocks)}`);
  lines.push(`**Parent of:** ${list(doc.parentOf)}`);
  if (doc.body) {
    lines.push("");
    lines.push(doc.body);
  }
  return lines.join("\n");
}

export function formatRebuild(report: RebuildReport): string {
  const lines = [`Reindexed ${report.nodes} item(s) and ${report.edges} edge(s) in ${report.durationMs}ms`];
  for (const edge of report.droppedEdges) {
    lines.push(`- dropped dangling ${edge.kind} edge ${edge.from} -> ${edge.to}`);
  }
  return lines.join("\n");
}
