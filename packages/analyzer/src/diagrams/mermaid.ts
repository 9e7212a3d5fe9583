/**
 * Mermaid renderers for analysis documents and flow trees.
 * Every renderer returns the diagram text with lines joined by "\n".
 */

import type { AnalysisDocument, FlowNode, LayerMap, SymbolName } from "../core/model.js";
import { LAYER_ORDER } from "../core/services/LayerDetector.js";
import { buildDiagramRelations } from "./relations.js";

const MAX_DEPS_PER_NODE = 5;
const MAX_CYCLES = 5;
const MAX_PIE_SLICES = 10;

/**
 * Node id for module and package diagrams: long dotted names collapse to
 * "first...last" before "." and "-" become "_".
 */
export function sanitizeModuleId(name: string): string {
  const parts = name.split(".");
  const short = parts.length > 2 ? `${parts[0]}...${parts[parts.length - 1]}` : name;
  return sanitizeId(short);
}

function own<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

export function sanitizeId(name: string): string {
  return name.replace(/[.\- ]/g, "_");
}

export function renderPackageDiagram(doc: AnalysisDocument): string {
  const lines = ["graph LR", "    %% Package Dependencies"];
  for (const { source, target } of buildDiagramRelations(doc).packageDependencies) {
    lines.push(`    ${sanitizeModuleId(source)} --> ${sanitizeModuleId(target)}`);
  }
  return lines.join("\n");
}

/**
 * Edges out of the highest fan-out modules, limited to dependencies that are
 * themselves analysed modules.
 */
export function renderModuleDiagram(doc: AnalysisDocument, maxModules = 15): string {
  const lines = ["graph TB", "    %% Module Dependencies (Top modules by connections)"];
  const modules = doc.moduleDependencies;

  for (const { module } of doc.metrics.highFanOut.slice(0, maxModules)) {
    for (const dep of (own(modules, module) ?? []).slice(0, MAX_DEPS_PER_NODE)) {
      if (own(modules, dep) !== undefined) {
        lines.push(`    ${sanitizeModuleId(module)} --> ${sanitizeModuleId(dep)}`);
      }
    }
  }
  return lines.join("\n");
}

export function renderCycleDiagram(doc: AnalysisDocument): string {
  const lines = ["graph LR", "    %% Circular Dependencies"];
  for (const { source, target, cycleIndex } of buildDiagramRelations(doc).cycles) {
    if (cycleIndex > MAX_CYCLES) break;
    lines.push(`    ${sanitizeModuleId(source)} -->|cycle ${cycleIndex}| ${sanitizeModuleId(target)}`);
  }
  return lines.join("\n");
}

export function renderExternalChart(doc: AnalysisDocument): string {
  const lines = ["%%{init: {'theme':'base'}}%%", "pie title External Package Usage"];
  for (const { name, count } of buildDiagramRelations(doc).externalPackages.slice(0, MAX_PIE_SLICES)) {
    lines.push(`    "${name}": ${count}`);
  }
  return lines.join("\n");
}

/**
 * One node per detected layer; arrows connect consecutive layers of the
 * conventional top-down order that are present.
 */
export function renderArchitectureDiagram(layers: LayerMap): string {
  const lines = ["graph TB", "    %% Architecture Overview", ""];

  for (const layer of Object.keys(layers)) {
    lines.push(`    ${sanitizeId(layer)}[${layer}]`);
  }

  const present = LAYER_ORDER.filter((layer) => layer in layers);
  for (let i = 0; i < present.length - 1; i++) {
    lines.push(`    ${sanitizeId(present[i])} --> ${sanitizeId(present[i + 1])}`);
  }

  return lines.join("\n");
}

/**
 * Pre-order flowchart of a trace; repeated functions get their own node.
 */
export function renderFlowchart(flow: FlowNode): string {
  const lines = ["flowchart TD"];
  let counter = 0;

  const addNode = (node: FlowNode, parentId?: string): void => {
    counter++;
    const id = `node${counter}`;
    lines.push(`    ${id}["${node.function}"]`);
    if (parentId) {
      lines.push(`    ${parentId} --> ${id}`);
    }
    for (const child of node.calls) {
      addNode(child, id);
    }
  };

  addNode(flow);
  return lines.join("\n");
}

/**
 * Call edges for the given functions, or for the `maxNodes` functions with
 * the longest call lists.
 */
export function renderCallGraph(
  callGraph: Record<SymbolName, readonly SymbolName[]>,
  functions?: readonly SymbolName[],
  maxNodes = 20
): string {
  const lines = ["graph LR"];

  const selected =
    functions && functions.length > 0
      ? functions
      : Object.keys(callGraph)
          .sort((a, b) => (own(callGraph, b)?.length ?? 0) - (own(callGraph, a)?.length ?? 0))
          .slice(0, maxNodes);

  const added = new Set<string>();
  for (const fn of selected) {
    for (const callee of (own(callGraph, fn) ?? []).slice(0, MAX_DEPS_PER_NODE)) {
      const key = `${fn}\u0000${callee}`;
      if (added.has(key)) continue;
      added.add(key);
      lines.push(`    ${sanitizeId(fn)} --> ${sanitizeId(callee)}`);
    }
  }

  return lines.join("\n");
}
