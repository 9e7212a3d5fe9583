/**
 * Cycle Detector - find circular imports in the module graph.
 */

import type { Cycle, ModuleGraph, SymbolName } from "../model.js";

/**
 * Detect circular dependencies using DFS.
 *
 * Roots and neighbours are visited in insertion order and `visited` is shared
 * across roots, so a cycle only reachable through a module expanded from an
 * earlier root is not reported. `findCyclicGroups` has no such gap.
 */
export function detectCycles(graph: ModuleGraph): Cycle[] {
  const cycles: Cycle[] = [];
  const seen = new Set<string>();
  const visited = new Set<SymbolName>();
  const recursionStack = new Set<SymbolName>();
  const pathStack: SymbolName[] = [];

  const visit = (module: SymbolName): void => {
    visited.add(module);
    recursionStack.add(module);
    pathStack.push(module);

    for (const dep of graph.get(module) ?? []) {
      if (!visited.has(dep)) {
        visit(dep);
      } else if (recursionStack.has(dep)) {
        const cycle = [...pathStack.slice(pathStack.indexOf(dep)), dep];
        // NUL cannot occur in a module name, so the key is unambiguous
        const key = cycle.join("\u0000");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      }
    }

    pathStack.pop();
    recursionStack.delete(module);
  };

  for (const module of graph.keys()) {
    if (!visited.has(module)) {
      visit(module);
    }
  }

  return cycles;
}

/**
 * Strongly connected components that contain a cycle (Tarjan).
 * Members and groups are ordered by DFS discovery.
 */
export function findCyclicGroups(graph: ModuleGraph): SymbolName[][] {
  const order = new Map<SymbolName, number>();
  const lowLink = new Map<SymbolName, number>();
  const stack: SymbolName[] = [];
  const onStack = new Set<SymbolName>();
  const groups: SymbolName[][] = [];

  const discoveryIndex = (name: SymbolName): number => order.get(name) ?? Number.MAX_SAFE_INTEGER;

  const connect = (module: SymbolName): void => {
    const index = order.size;
    order.set(module, index);
    lowLink.set(module, index);
    stack.push(module);
    onStack.add(module);

    for (const dep of graph.get(module) ?? []) {
      if (!order.has(dep)) {
        connect(dep);
        lowLink.set(module, Math.min(lowLink.get(module) ?? index, lowLink.get(dep) ?? index));
      } else if (onStack.has(dep)) {
        lowLink.set(module, Math.min(lowLink.get(module) ?? index, discoveryIndex(dep)));
      }
    }

    if (lowLink.get(module) !== index) return;

    const members: SymbolName[] = [];
    let member: SymbolName | undefined;
    do {
      member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      members.push(member);
    } while (member !== module);

    const selfLoop = members.length === 1 && (graph.get(module)?.has(module) ?? false);
    if (members.length > 1 || selfLoop) {
      groups.push(members.sort((a, b) => discoveryIndex(a) - discoveryIndex(b)));
    }
  };

  for (const module of graph.keys()) {
    if (!order.has(module)) {
      connect(module);
    }
  }

  return groups.sort((a, b) => discoveryIndex(a[0]) - discoveryIndex(b[0]));
}
