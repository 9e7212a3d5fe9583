/**
 * Human-readable renderings shared by the MCP tools and the CLI.
 */

import type { AnalysisDocument, FlowNode, FunctionPatterns } from "./core/model.js";

export type PatternKind = "auth" | "data" | "all";

const LIST_LIMIT = 10;
const CYCLE_LIMIT = 5;

/**
 * Markdown summary of an analysis document.
 */
export function formatAnalysisSummary(doc: AnalysisDocument): string {
  const { metrics, summary } = doc;
  const lines: string[] = [
    `# Dependency Analysis: ${doc.root}`,
    "",
    `- Files parsed: ${summary.filesParsed} of ${summary.filesScanned}` +
      (summary.filesFailed > 0 ? ` (${summary.filesFailed} failed)` : ""),
    `- Total modules: ${metrics.totalModules}`,
    `- Internal dependencies: ${metrics.totalInternalDeps}`,
    `- External packages: ${metrics.totalExternalDeps}`,
    `- Circular dependencies: ${metrics.circularDependencies}`,
    `- Functions: ${summary.totalFunctions} (${summary.totalCalls} calls)`,
    "",
  ];

  if (metrics.topExternalPackages.length > 0) {
    lines.push("## Top external packages");
    for (const { name, count } of metrics.topExternalPackages.slice(0, LIST_LIMIT)) {
      lines.push(`- ${name}: ${count} uses`);
    }
    lines.push("");
  }

  if (metrics.highFanOut.length > 0) {
    lines.push("## Highest fan-out");
    for (const { module, count } of metrics.highFanOut) {
      lines.push(`- ${module}: ${count}`);
    }
    lines.push("");
  }

  if (metrics.highFanIn.length > 0) {
    lines.push("## Highest fan-in");
    for (const { module, count } of metrics.highFanIn) {
      lines.push(`- ${module}: ${count}`);
    }
    lines.push("");
  }

  if (doc.circularDependencies.length > 0) {
    lines.push(`## Circular Dependencies (${doc.circularDependencies.length} found)`);
    for (const cycle of doc.circularDependencies.slice(0, CYCLE_LIMIT)) {
      lines.push(`- ${cycle.join(" -> ")}`);
    }
    if (doc.circularDependencies.length > CYCLE_LIMIT) {
      lines.push(`... and ${doc.circularDependencies.length - CYCLE_LIMIT} more`);
    }
    lines.push("");
  } else {
    lines.push("No circular dependencies detected.", "");
  }

  const layers = Object.entries(doc.layers);
  if (layers.length > 0) {
    lines.push("## Layers");
    for (const [layer, dirs] of layers) {
      lines.push(`- ${layer}: ${dirs.join(", ")}`);
    }
    lines.push("");
  }

  if (doc.failures.length > 0) {
    lines.push(`## Files not analyzed (${doc.failures.length})`);
    for (const { file, reason } of doc.failures) {
      lines.push(`- ${file}: ${reason}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

/**
 * Indented call tree, two spaces per level.
 */
export function formatFlowTree(node: FlowNode, depth = 0): string {
  const lines = [`${"  ".repeat(depth)}${node.function}`];
  for (const child of node.calls) {
    lines.push(formatFlowTree(child, depth + 1));
  }
  return lines.join("\n");
}

export function selectPatterns(patterns: FunctionPatterns, kind: PatternKind): Partial<FunctionPatterns> {
  switch (kind) {
    case "auth":
      return { authenticationFunctions: patterns.authenticationFunctions };
    case "data":
      return { dataProcessingFunctions: patterns.dataProcessingFunctions };
    case "all":
      return patterns;
  }
}

function patternSection(title: string, names: readonly string[] | undefined): string[] {
  if (names === undefined) return [];
  if (names.length === 0) return [`## ${title}`, "None found.", ""];
  return [`## ${title} (${names.length})`, ...names.map((name) => `- ${name}`), ""];
}

export function formatPatterns(patterns: Partial<FunctionPatterns>): string {
  return [
    ...patternSection("Authentication functions", patterns.authenticationFunctions),
    ...patternSection("Data processing functions", patterns.dataProcessingFunctions),
  ]
    .join("\n")
    .trimEnd();
}
