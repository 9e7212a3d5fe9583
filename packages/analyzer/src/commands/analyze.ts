/**
 * `structmap analyze` - write the analysis document and Mermaid diagrams next to a prefix.
 */

import { Err, Ok, type Result } from "@structmap/core";

import type { FileSystem } from "../core/ports/FileSystem.js";
import type { AnalysisSession } from "../core/services/DependencyAnalyzer.js";
import {
  renderArchitectureDiagram,
  renderCallGraph,
  renderCycleDiagram,
  renderFlowchart,
  renderModuleDiagram,
  renderPackageDiagram,
} from "../diagrams/mermaid.js";
import { formatFlowTree, type PatternKind } from "../format.js";
import type { AnalysisWorkspace } from "../workspace.js";

export type DiagramSelection = "all" | "package" | "module" | "circular" | "architecture";

export const DIAGRAM_SELECTIONS: readonly DiagramSelection[] = [
  "all",
  "package",
  "module",
  "circular",
  "architecture",
];

export const PATTERN_KINDS: readonly PatternKind[] = ["auth", "data", "all"];

export interface AnalyzeCommandOptions {
  output: string;
  diagrams: DiagramSelection;
  trace?: string;
  depth?: number;
  pattern: PatternKind;
}

export interface AnalyzeCommandContext {
  workspace: AnalysisWorkspace;
  fs: FileSystem;
  /** stdout */
  print: (line: string) => void;
}

const PATTERN_PREVIEW = 10;

function wants(selection: DiagramSelection, diagram: Exclude<DiagramSelection, "all">): boolean {
  return selection === "all" || selection === diagram;
}

function writeArtifacts(
  session: AnalysisSession,
  options: AnalyzeCommandOptions,
  ctx: AnalyzeCommandContext
): Result<void, Error> {
  const doc = session.toDocument();
  const { output, diagrams } = options;

  const write = (file: string, content: string, label: string): Result<void, Error> => {
    const written = ctx.fs.write(file, content);
    if (written.ok) ctx.print(`${label}: ${file}`);
    return written;
  };

  const files: Array<[string, string, string]> = [
    [`${output}_analysis.json`, JSON.stringify(doc, null, 2), "Full analysis"],
  ];

  if (wants(diagrams, "package")) {
    files.push([`${output}_packages.mmd`, renderPackageDiagram(doc), "Package diagram"]);
  }
  if (wants(diagrams, "module")) {
    files.push([`${output}_modules.mmd`, renderModuleDiagram(doc), "Module diagram"]);
  }
  if (wants(diagrams, "circular") && doc.circularDependencies.length > 0) {
    files.push([`${output}_circular.mmd`, renderCycleDiagram(doc), "Circular dependencies"]);
  }
  if (wants(diagrams, "architecture") && Object.keys(doc.layers).length > 0) {
    files.push([`${output}_architecture.mmd`, renderArchitectureDiagram(doc.layers), "Architecture diagram"]);
  }

  if (options.trace) {
    const trace = session.trace(options.trace, options.depth);
    ctx.print("");
    ctx.print(`Flow from ${trace.start}:`);
    ctx.print(formatFlowTree(trace.flow));
    files.push([`${output}_trace_${options.trace}.mmd`, renderFlowchart(trace.flow), "Flow trace diagram"]);
    files.push([`${output}_trace_${options.trace}.json`, JSON.stringify(trace, null, 2), "Flow tree data"]);
  }

  const { authenticationFunctions, dataProcessingFunctions } = doc.patterns;
  const patternFiles: Array<[PatternKind, string[], string, string]> = [
    ["auth", authenticationFunctions, "auth_flow", "Authentication"],
    ["data", dataProcessingFunctions, "data_flow", "Data processing"],
  ];
  for (const [kind, names, suffix, title] of patternFiles) {
    if ((options.pattern !== "all" && options.pattern !== kind) || names.length === 0) continue;
    const preview = names.slice(0, PATTERN_PREVIEW);
    ctx.print("");
    ctx.print(`${title} functions found: ${names.length}`);
    for (const name of preview) ctx.print(`  - ${name}`);
    files.push([`${output}_${suffix}.mmd`, renderCallGraph(doc.callGraph, preview), `${title} flow diagram`]);
  }

  ctx.print("");
  for (const [file, content, label] of files) {
    const written = write(file, content, label);
    if (!written.ok) {
      return Err(new Error(`Could not write ${file}: ${written.error.message}`));
    }
  }

  return Ok(undefined);
}

export async function analyzeCommand(
  rootPath: string,
  options: AnalyzeCommandOptions,
  ctx: AnalyzeCommandContext
): Promise<Result<void, Error>> {
  const result = await ctx.workspace.analyze(rootPath);
  if (!result.ok) return result;

  const session = result.value;
  const { metrics, summary } = session.toDocument();

  ctx.print("Dependency Analysis:");
  ctx.print(`  Files parsed: ${summary.filesParsed} of ${summary.filesScanned}`);
  ctx.print(`  Total modules: ${metrics.totalModules}`);
  ctx.print(`  Internal dependencies: ${metrics.totalInternalDeps}`);
  ctx.print(`  External packages: ${metrics.totalExternalDeps}`);
  ctx.print(`  Circular dependencies: ${metrics.circularDependencies}`);
  ctx.print(`  Functions: ${summary.totalFunctions} (${summary.totalCalls} calls)`);

  const written = writeArtifacts(session, options, ctx);
  if (!written.ok) return written;

  if (metrics.topExternalPackages.length > 0) {
    ctx.print("");
    ctx.print("Top External Packages:");
    for (const { name, count } of metrics.topExternalPackages.slice(0, PATTERN_PREVIEW)) {
      ctx.print(`  ${name}: ${count} uses`);
    }
  }

  if (metrics.circularDependencies > 0) {
    ctx.print("");
    ctx.print(`Warning: ${metrics.circularDependencies} circular dependencies detected!`);
  }

  return Ok(undefined);
}
