/**
 * Dependency Analyzer - run one analysis session over a source tree.
 */

import path from "node:path";

import { ConfigurationError, Err, Ok, type Logger, type Result, silentLogger } from "@structmap/core";

import type {
  AnalysisDocument,
  AnalysisOptions,
  Cycle,
  DependencyGraph,
  DependencyMetrics,
  FlowDocument,
  FunctionNode,
  FunctionPatterns,
  LayerMap,
  SymbolName,
} from "../model.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { ProjectScanner } from "../ports/ProjectScanner.js";
import type { SymbolExtractor } from "../ports/SymbolExtractor.js";
import { detectCycles, findCyclicGroups } from "./CycleDetector.js";
import { classifyFunctions, traceFlow } from "./FlowTracer.js";
import { buildDependencyGraph } from "./GraphBuilder.js";
import { detectLayers } from "./LayerDetector.js";
import { computeMetrics, computePackageStructure } from "./MetricsEngine.js";

export interface DependencyAnalyzerDeps {
  fs: FileSystem;
  scanner: ProjectScanner;
  extractor: SymbolExtractor;
  logger?: Logger;
}

/**
 * Read-only results of one analysis. Nothing is shared with other sessions.
 */
export class AnalysisSession {
  readonly cycles: readonly Cycle[];
  readonly cyclicGroups: readonly SymbolName[][];
  readonly metrics: DependencyMetrics;
  readonly packageStructure: ReadonlyMap<string, string[]>;
  readonly patterns: FunctionPatterns;

  constructor(
    readonly root: string,
    readonly graph: DependencyGraph,
    readonly layers: LayerMap,
    readonly filesScanned: number,
    readonly options: AnalysisOptions
  ) {
    this.cycles = detectCycles(graph.moduleGraph);
    this.cyclicGroups = findCyclicGroups(graph.moduleGraph);
    this.metrics = computeMetrics(
      graph.moduleGraph,
      graph.externalCounts,
      this.cycles.length,
      options.limits
    );
    this.packageStructure = computePackageStructure(graph.moduleGraph);
    this.patterns = classifyFunctions(graph.functions.keys(), options.keywords);
  }

  /**
   * Call tree below `start`. An unknown name yields a single-node tree.
   */
  trace(start: SymbolName, maxDepth: number = this.options.trace.maxDepth): FlowDocument {
    return {
      root: this.root,
      start,
      maxDepth,
      flow: traceFlow(this.graph.callGraph, start, maxDepth),
      patterns: this.patterns,
    };
  }

  toDocument(): AnalysisDocument {
    const { graph } = this;

    const moduleDependencies: Record<SymbolName, SymbolName[]> = {};
    for (const [module, deps] of graph.moduleGraph) {
      moduleDependencies[module] = [...deps];
    }

    const functions: Record<SymbolName, FunctionNode> = {};
    for (const [name, fn] of graph.functions) {
      functions[name] = fn;
    }

    const callGraph: Record<SymbolName, SymbolName[]> = {};
    let totalCalls = 0;
    for (const [caller, callees] of graph.callGraph) {
      callGraph[caller] = [...callees];
      totalCalls += callees.length;
    }

    return {
      root: this.root,
      moduleDependencies,
      externalDependencies: Object.fromEntries(graph.externalCounts),
      packageStructure: Object.fromEntries(this.packageStructure),
      circularDependencies: this.cycles.map((cycle) => [...cycle]),
      cyclicGroups: this.cyclicGroups.map((group) => [...group]),
      metrics: this.metrics,
      layers: this.layers,
      functions,
      callGraph,
      duplicateFunctions: [...graph.duplicateFunctions],
      summary: {
        filesScanned: this.filesScanned,
        filesParsed: graph.filesParsed,
        filesFailed: graph.failures.length,
        totalFunctions: graph.functions.size,
        totalCalls,
      },
      patterns: this.patterns,
      failures: [...graph.failures],
    };
  }
}

/**
 * Absolute analysis root, or a ConfigurationError before any traversal.
 */
export function resolveAnalysisRoot(rootPath: string, fs: FileSystem): Result<string, ConfigurationError> {
  if (rootPath.trim().length === 0) {
    return Err(new ConfigurationError("Analysis root path is empty"));
  }

  const root = path.resolve(rootPath);
  if (!fs.exists(root)) {
    return Err(new ConfigurationError(`Analysis root does not exist: ${root}`));
  }
  if (!fs.isDirectory(root)) {
    return Err(new ConfigurationError(`Analysis root is not a directory: ${root}`));
  }

  return Ok(root);
}

/**
 * Validates the root, scans it, builds the graphs and derives everything else.
 */
export class DependencyAnalyzer {
  private readonly logger: Logger;

  constructor(private readonly deps: DependencyAnalyzerDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async analyze(rootPath: string, options: AnalysisOptions): Promise<Result<AnalysisSession, Error>> {
    const rootCheck = resolveAnalysisRoot(rootPath, this.deps.fs);
    if (!rootCheck.ok) return rootCheck;
    const root = rootCheck.value;

    this.logger.info(`Analyzing ${root}`);

    const scanResult = await this.deps.scanner.scan(root, {
      extensions: this.deps.extractor.supportedExtensions(),
      excludeDirs: options.excludeDirs,
      skipTestFiles: options.skipTestFiles,
    });
    if (!scanResult.ok) {
      return Err(scanResult.error);
    }
    const files = scanResult.value;

    const graph = await buildDependencyGraph(files, {
      extractor: this.deps.extractor,
      fs: this.deps.fs,
      logger: this.logger,
      classification: options.classification,
      resolvePath: (relativePath) => path.join(root, relativePath),
    });

    const session = new AnalysisSession(
      root,
      graph,
      detectLayers(root, this.deps.fs),
      files.length,
      options
    );

    this.logger.info(
      `Analyzed ${graph.filesParsed} of ${files.length} files: ${graph.modules.size} modules, ` +
        `${graph.functions.size} functions, ${session.cycles.length} circular dependencies`
    );

    return Ok(session);
  }
}
