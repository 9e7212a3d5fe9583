// Core types and services
export * from "./core/model.js";
export * from "./core/moduleNames.js";
export type { FileSystem } from "./core/ports/FileSystem.js";
export type { ProjectScanner, ScanOptions } from "./core/ports/ProjectScanner.js";
export type { SymbolExtractor } from "./core/ports/SymbolExtractor.js";
export { GraphBuilder, buildDependencyGraph } from "./core/services/GraphBuilder.js";
export type { BuildContext, GraphBuilderOptions } from "./core/services/GraphBuilder.js";
export { detectCycles, findCyclicGroups } from "./core/services/CycleDetector.js";
export {
  DEFAULT_METRIC_LIMITS,
  computeFanIn,
  computeFanOut,
  computeMetrics,
  computePackageStructure,
} from "./core/services/MetricsEngine.js";
export {
  DEFAULT_KEYWORDS,
  DEFAULT_TRACE_DEPTH,
  classifyFunctions,
  flattenFlow,
  traceFlow,
} from "./core/services/FlowTracer.js";
export { LAYER_DIRECTORIES, LAYER_ORDER, detectLayers } from "./core/services/LayerDetector.js";
export {
  AnalysisSession,
  DependencyAnalyzer,
  resolveAnalysisRoot,
} from "./core/services/DependencyAnalyzer.js";
export type { DependencyAnalyzerDeps } from "./core/services/DependencyAnalyzer.js";

// Configuration and session management
export * from "./config.js";
export { AnalysisWorkspace } from "./workspace.js";
export type { AnalysisWorkspaceOptions } from "./workspace.js";

// Diagrams and text output
export * from "./diagrams/mermaid.js";
export * from "./diagrams/relations.js";
export * from "./format.js";

// Infrastructure implementations
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { NodeProjectScanner } from "./infrastructure/scanner/NodeProjectScanner.js";
export { TreeSitterExtractor, findSyntaxError } from "./infrastructure/parsers/TreeSitterExtractor.js";
export { findImports } from "./infrastructure/parsers/ImportExtractor.js";
export { findFunctions } from "./infrastructure/parsers/FunctionExtractor.js";

// Tool exports
export { registerAllTools, type Services } from "./tools/index.js";
