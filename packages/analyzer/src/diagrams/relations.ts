/**
 * Deduplicated edge and pair lists a diagram renderer draws from.
 */

import type { AnalysisDocument, PackageCount, SymbolName } from "../core/model.js";

export interface Relation {
  source: SymbolName;
  target: SymbolName;
}

export interface CycleRelation extends Relation {
  /** 1-based position of the cycle in `circularDependencies` */
  cycleIndex: number;
}

export interface DiagramRelations {
  dependencies: Relation[];
  packageDependencies: Relation[];
  cycles: CycleRelation[];
  externalPackages: PackageCount[];
}

function edges(adjacency: Record<string, readonly string[]>): Relation[] {
  const seen = new Set<string>();
  const relations: Relation[] = [];
  for (const [source, targets] of Object.entries(adjacency)) {
    for (const target of targets) {
      const key = `${source}\u0000${target}`;
      if (seen.has(key)) continue;
      seen.add(key);
      relations.push({ source, target });
    }
  }
  return relations;
}

export function buildDiagramRelations(doc: AnalysisDocument): DiagramRelations {
  const seenCycleEdges = new Set<string>();
  const cycles: CycleRelation[] = [];

  doc.circularDependencies.forEach((cycle, index) => {
    for (let i = 0; i < cycle.length - 1; i++) {
      const source = cycle[i];
      const target = cycle[i + 1];
      const key = `${index}\u0000${source}\u0000${target}`;
      if (seenCycleEdges.has(key)) continue;
      seenCycleEdges.add(key);
      cycles.push({ source, target, cycleIndex: index + 1 });
    }
  });

  return {
    dependencies: edges(doc.moduleDependencies),
    packageDependencies: edges(doc.packageStructure),
    cycles,
    externalPackages: doc.metrics.topExternalPackages.map(({ name, count }) => ({ name, count })),
  };
}
