/**
 * Metrics Engine - coupling metrics derived from the module graph.
 */

import type {
  DependencyMetrics,
  MetricLimits,
  ModuleCount,
  ModuleGraph,
  PackageCount,
  SymbolName,
} from "../model.js";
import { topLevelName } from "../moduleNames.js";

export const DEFAULT_METRIC_LIMITS: MetricLimits = {
  fanIn: 10,
  fanOut: 10,
  external: 15,
};

export function computeFanOut(graph: ModuleGraph): Map<SymbolName, number> {
  const fanOut = new Map<SymbolName, number>();
  for (const [module, deps] of graph) {
    fanOut.set(module, deps.size);
  }
  return fanOut;
}

/**
 * Number of distinct modules depending on each name.
 * Names only present as dependency targets are included.
 */
export function computeFanIn(graph: ModuleGraph): Map<SymbolName, number> {
  const fanIn = new Map<SymbolName, number>();
  for (const deps of graph.values()) {
    for (const dep of deps) {
      fanIn.set(dep, (fanIn.get(dep) ?? 0) + 1);
    }
  }
  return fanIn;
}

/**
 * Sort entries by count, descending. Array.prototype.sort is stable, so ties
 * keep their insertion order.
 */
function topByCount(counts: ReadonlyMap<string, number>, limit: number): [string, number][] {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, Math.max(0, limit));
}

export function computeMetrics(
  graph: ModuleGraph,
  externalCounts: ReadonlyMap<string, number>,
  circularDependencies: number,
  limits: MetricLimits = DEFAULT_METRIC_LIMITS
): DependencyMetrics {
  const fanOut = computeFanOut(graph);
  const fanIn = computeFanIn(graph);

  let totalInternalDeps = 0;
  for (const count of fanOut.values()) totalInternalDeps += count;

  const toModuleCount = ([module, count]: [string, number]): ModuleCount => ({ module, count });
  const toPackageCount = ([name, count]: [string, number]): PackageCount => ({ name, count });

  return {
    totalModules: graph.size,
    totalInternalDeps,
    totalExternalDeps: externalCounts.size,
    circularDependencies,
    highFanOut: topByCount(fanOut, limits.fanOut).map(toModuleCount),
    highFanIn: topByCount(fanIn, limits.fanIn).map(toModuleCount),
    topExternalPackages: topByCount(externalCounts, limits.external).map(toPackageCount),
  };
}

/**
 * Namespace-level dependencies: top-level name to the distinct foreign
 * top-level names its modules import. Namespaces without a foreign edge are omitted.
 */
export function computePackageStructure(graph: ModuleGraph): Map<string, string[]> {
  const packages = new Map<string, Set<string>>();

  for (const [module, deps] of graph) {
    const pkg = topLevelName(module);
    for (const dep of deps) {
      const depPkg = topLevelName(dep);
      if (depPkg === pkg) continue;
      const targets = packages.get(pkg) ?? new Set<string>();
      targets.add(depPkg);
      packages.set(pkg, targets);
    }
  }

  return new Map([...packages].map(([pkg, targets]) => [pkg, [...targets]]));
}
