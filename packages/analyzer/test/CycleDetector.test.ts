import { describe, it, expect } from "vitest";

import type { ModuleGraph } from "../src/core/model.js";
import { detectCycles, findCyclicGroups } from "../src/core/services/CycleDetector.js";

function graphOf(edges: Record<string, string[]>): ModuleGraph {
  return new Map(Object.entries(edges).map(([module, deps]) => [module, new Set(deps)]));
}

describe("detectCycles", () => {
  it("reports a three-module cycle closed on its first module", () => {
    const graph = graphOf({ a: ["b"], b: ["c"], c: ["a"] });
    expect(detectCycles(graph)).toEqual([["a", "b", "c", "a"]]);
  });

  it("reports a self import", () => {
    expect(detectCycles(graphOf({ x: ["x"] }))).toEqual([["x", "x"]]);
  });

  it("returns nothing for an acyclic graph", () => {
    expect(detectCycles(graphOf({ a: ["b", "c"], b: ["c"], c: [] }))).toEqual([]);
  });

  it("ignores dependencies that are not modules of the graph", () => {
    expect(detectCycles(graphOf({ a: ["z"] }))).toEqual([]);
  });

  it("finds back edges in neighbour order", () => {
    const graph = graphOf({ a: ["b"], b: ["a", "c"], c: ["b"] });
    expect(detectCycles(graph)).toEqual([
      ["a", "b", "a"],
      ["b", "c", "b"],
    ]);
  });

  it("reports every elementary cycle reachable from a single root", () => {
    const graph = graphOf({ a: ["b"], b: ["c", "d"], c: ["a"], d: ["b"] });
    expect(detectCycles(graph)).toEqual([
      ["a", "b", "c", "a"],
      ["b", "d", "b"],
    ]);
  });

  it("only reports closed paths of real edges", () => {
    const graph = graphOf({ a: ["b", "c"], b: ["c", "a"], c: ["d"], d: ["a", "d"], e: ["e", "a"] });

    const cycles = detectCycles(graph);
    expect(cycles.length).toBeGreaterThan(0);
    for (const cycle of cycles) {
      expect(cycle.length).toBeGreaterThanOrEqual(2);
      expect(cycle[cycle.length - 1]).toBe(cycle[0]);
      for (let i = 0; i < cycle.length - 1; i++) {
        expect(graph.get(cycle[i])?.has(cycle[i + 1])).toBe(true);
      }
    }
  });

  it("misses a cycle that only closes through an already finished module", () => {
    // a -> c -> b -> a is never reported: b is finished before c is visited
    const graph = graphOf({ a: ["b", "c"], b: ["a"], c: ["b"] });
    expect(detectCycles(graph)).toEqual([["a", "b", "a"]]);
  });
});

describe("findCyclicGroups", () => {
  it("groups every module on a cycle", () => {
    const graph = graphOf({ a: ["b", "c"], b: ["a"], c: ["b"] });
    expect(findCyclicGroups(graph)).toEqual([["a", "b", "c"]]);
  });

  it("keeps singletons only when they import themselves", () => {
    const graph = graphOf({ x: ["x", "y"], y: [] });
    expect(findCyclicGroups(graph)).toEqual([["x"]]);
  });

  it("orders separate groups by discovery", () => {
    const graph = graphOf({ a: ["b"], b: ["a"], c: ["d"], d: ["c"], e: ["a"] });
    expect(findCyclicGroups(graph)).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });
});
