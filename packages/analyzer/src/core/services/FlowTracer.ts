/**
 * Flow Tracer - bounded call-graph traversal and keyword labelling.
 */

import type {
  CallGraph,
  FlowNode,
  FunctionPatterns,
  PatternKeywords,
  SymbolName,
} from "../model.js";

export const DEFAULT_TRACE_DEPTH = 5;

export const DEFAULT_KEYWORDS: PatternKeywords = {
  authentication: ["auth", "login", "token", "verify", "authenticate", "session"],
  dataProcessing: ["process", "transform", "parse", "validate", "sanitize", "format"],
};

/**
 * Build the call tree below `start`.
 *
 * `visited` is global to the trace: each function is expanded at most once,
 * later occurrences stay in the tree as leaves.
 */
export function traceFlow(
  callGraph: CallGraph,
  start: SymbolName,
  maxDepth: number = DEFAULT_TRACE_DEPTH
): FlowNode {
  const visited = new Set<SymbolName>();
  const root: FlowNode = { function: start, calls: [] };

  const expand = (name: SymbolName, depth: number, node: FlowNode): void => {
    if (depth >= maxDepth || visited.has(name)) return;
    visited.add(name);

    for (const callee of callGraph.get(name) ?? []) {
      const child: FlowNode = { function: callee, calls: [] };
      node.calls.push(child);
      expand(callee, depth + 1, child);
    }
  };

  expand(start, 0, root);
  return root;
}

function matchesAny(name: SymbolName, keywords: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

/**
 * Label function names by case-insensitive keyword match. Lists are sorted.
 */
export function classifyFunctions(
  names: Iterable<SymbolName>,
  keywords: PatternKeywords = DEFAULT_KEYWORDS
): FunctionPatterns {
  const authenticationFunctions: SymbolName[] = [];
  const dataProcessingFunctions: SymbolName[] = [];

  for (const name of names) {
    if (matchesAny(name, keywords.authentication)) authenticationFunctions.push(name);
    if (matchesAny(name, keywords.dataProcessing)) dataProcessingFunctions.push(name);
  }

  return {
    authenticationFunctions: authenticationFunctions.sort(),
    dataProcessingFunctions: dataProcessingFunctions.sort(),
  };
}

/**
 * Flatten a flow tree in pre-order.
 */
export function flattenFlow(node: FlowNode): SymbolName[] {
  return [node.function, ...node.calls.flatMap(flattenFlow)];
}
