/**
 * Core domain types for dependency and call-graph analysis.
 */

/** Dotted identifier: a module path ("pkg.sub.mod") or a bare function name. */
export type SymbolName = string;

export type LanguageId = "python" | "typescript" | "javascript";

export interface Language {
  id: LanguageId;
  name: string;
  extensions: string[];
  /** Trailing path segment that names its package ("__init__", "index") */
  packageEntry: string;
}

export const LANGUAGES: Record<LanguageId, Language> = {
  python: {
    id: "python",
    name: "Python",
    extensions: [".py", ".pyi"],
    packageEntry: "__init__",
  },
  typescript: {
    id: "typescript",
    name: "TypeScript",
    extensions: [".ts", ".tsx", ".mts", ".cts"],
    packageEntry: "index",
  },
  javascript: {
    id: "javascript",
    name: "JavaScript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
    packageEntry: "index",
  },
};

/**
 * Detect language from file path extension.
 * Declaration files are not source.
 */
export function detectLanguage(filePath: string): Language | undefined {
  if (filePath.endsWith(".d.ts")) return undefined;
  const dot = filePath.lastIndexOf(".");
  if (dot < 0) return undefined;
  const ext = filePath.slice(dot).toLowerCase();
  return Object.values(LANGUAGES).find((lang) => lang.extensions.includes(ext));
}

/**
 * An import as seen by the graph builder.
 * `name` is `segments.join(".")`; `segments[0]` is the top-level name.
 */
export interface ImportReference {
  name: SymbolName;
  segments: string[];
  line: number;
}

/**
 * A function or method declaration with the calls made lexically inside it.
 */
export interface FunctionDeclaration {
  name: SymbolName;
  /** Root-relative path, "/"-separated */
  file: string;
  params: string[];
  /** Return annotation text, without the leading ":" or "->" */
  returns: string | null;
  /** 1-indexed */
  line: number;
  decorators: string[];
  /** Callee names in source order, duplicates kept */
  calls: SymbolName[];
}

/**
 * Everything the analysis needs from one source file.
 */
export interface ExtractedFile {
  file: string;
  module: SymbolName;
  language: LanguageId;
  imports: ImportReference[];
  functions: FunctionDeclaration[];
}

export interface SourceFile {
  /** Root-relative path, "/"-separated */
  path: string;
  content: string;
}

export interface ModuleNode {
  name: SymbolName;
  file: string;
  language: LanguageId;
  /** Internal import names, deduplicated */
  dependencies: ReadonlySet<SymbolName>;
  /** Top-level names of external packages this module references */
  externals: ReadonlySet<string>;
}

export type FunctionNode = Omit<FunctionDeclaration, "calls">;

export interface FileFailure {
  file: string;
  reason: string;
}

/**
 * How imports are split into internal and external.
 *
 * - `pre-index`: every module of the tree is known before any import is classified.
 * - `discovery-order`: only modules built so far (the importing one included) count.
 */
export type ClassificationMode = "pre-index" | "discovery-order";

export type ModuleGraph = ReadonlyMap<SymbolName, ReadonlySet<SymbolName>>;

export type CallGraph = ReadonlyMap<SymbolName, readonly SymbolName[]>;

/**
 * Frozen output of one build.
 */
export interface DependencyGraph {
  modules: ReadonlyMap<SymbolName, ModuleNode>;
  /** Module name to internal dependency names */
  moduleGraph: ModuleGraph;
  externalCounts: ReadonlyMap<string, number>;
  functions: ReadonlyMap<SymbolName, FunctionNode>;
  callGraph: CallGraph;
  /** Function names declared in more than one file */
  duplicateFunctions: readonly SymbolName[];
  failures: readonly FileFailure[];
  filesParsed: number;
}

/** `[m1, ..., mk, m1]` */
export type Cycle = readonly SymbolName[];

export interface ModuleCount {
  module: SymbolName;
  count: number;
}

export interface PackageCount {
  name: string;
  count: number;
}

export interface MetricLimits {
  fanIn: number;
  fanOut: number;
  external: number;
}

export interface DependencyMetrics {
  totalModules: number;
  totalInternalDeps: number;
  totalExternalDeps: number;
  circularDependencies: number;
  highFanOut: ModuleCount[];
  highFanIn: ModuleCount[];
  topExternalPackages: PackageCount[];
}

export interface FlowNode {
  function: SymbolName;
  calls: FlowNode[];
}

export interface FunctionPatterns {
  authenticationFunctions: SymbolName[];
  dataProcessingFunctions: SymbolName[];
}

export interface PatternKeywords {
  authentication: string[];
  dataProcessing: string[];
}

export type LayerMap = Record<string, string[]>;

/**
 * JSON document describing one analysis session.
 */
export interface AnalysisDocument {
  root: string;
  moduleDependencies: Record<SymbolName, SymbolName[]>;
  externalDependencies: Record<string, number>;
  packageStructure: Record<string, string[]>;
  circularDependencies: SymbolName[][];
  cyclicGroups: SymbolName[][];
  metrics: DependencyMetrics;
  layers: LayerMap;
  functions: Record<SymbolName, FunctionNode>;
  callGraph: Record<SymbolName, SymbolName[]>;
  duplicateFunctions: SymbolName[];
  summary: {
    filesScanned: number;
    filesParsed: number;
    filesFailed: number;
    totalFunctions: number;
    totalCalls: number;
  };
  patterns: FunctionPatterns;
  failures: FileFailure[];
}

export interface FlowDocument {
  root: string;
  start: SymbolName;
  maxDepth: number;
  flow: FlowNode;
  patterns: FunctionPatterns;
}

/**
 * Everything one analysis session is parameterised by.
 */
export interface AnalysisOptions {
  excludeDirs: string[];
  skipTestFiles: boolean;
  classification: ClassificationMode;
  limits: MetricLimits;
  trace: { maxDepth: number };
  keywords: PatternKeywords;
}
