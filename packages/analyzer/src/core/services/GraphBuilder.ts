/**
 * Graph Builder - accumulate extractor output into the module and call graphs.
 */

import { andThen, tryCatchAsync, type Logger } from "@structmap/core";

import type {
  ClassificationMode,
  DependencyGraph,
  ExtractedFile,
  FileFailure,
  FunctionNode,
  ImportReference,
  LanguageId,
  ModuleNode,
  SymbolName,
} from "../model.js";
import { topLevelName } from "../moduleNames.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { SymbolExtractor } from "../ports/SymbolExtractor.js";

export interface GraphBuilderOptions {
  classification: ClassificationMode;
}

interface PendingModule {
  name: SymbolName;
  file: string;
  language: LanguageId;
  imports: ImportReference[];
}

/**
 * Owns every accumulator while files are added; `build()` hands back a
 * read-only graph and closes the builder.
 */
export class GraphBuilder {
  private readonly pending = new Map<SymbolName, PendingModule>();
  private readonly functions = new Map<SymbolName, FunctionNode>();
  private readonly declaredIn = new Map<SymbolName, Set<string>>();
  private readonly calls = new Map<SymbolName, SymbolName[]>();
  private readonly failures: FileFailure[] = [];
  private parsedFiles = 0;
  private built = false;

  constructor(private readonly options: GraphBuilderOptions) {}

  addFile(extracted: ExtractedFile): void {
    this.assertOpen();
    this.parsedFiles++;

    // Two files can map to one module ("a.ts" and "a/index.ts"); the first one names it.
    const existing = this.pending.get(extracted.module);
    if (existing) {
      existing.imports.push(...extracted.imports);
    } else {
      this.pending.set(extracted.module, {
        name: extracted.module,
        file: extracted.file,
        language: extracted.language,
        imports: [...extracted.imports],
      });
    }

    for (const { calls, ...fn } of extracted.functions) {
      this.functions.set(fn.name, fn);

      const files = this.declaredIn.get(fn.name) ?? new Set<string>();
      files.add(fn.file);
      this.declaredIn.set(fn.name, files);

      if (calls.length === 0) continue;
      const callList = this.calls.get(fn.name);
      if (callList) {
        callList.push(...calls);
      } else {
        this.calls.set(fn.name, [...calls]);
      }
    }
  }

  addFailure(file: string, reason: string): void {
    this.assertOpen();
    this.failures.push({ file, reason });
  }

  build(): DependencyGraph {
    this.assertOpen();
    this.built = true;

    const known = new Set<string>();
    if (this.options.classification === "pre-index") {
      for (const name of this.pending.keys()) {
        known.add(topLevelName(name));
      }
    }

    const modules = new Map<SymbolName, ModuleNode>();
    const moduleGraph = new Map<SymbolName, ReadonlySet<SymbolName>>();
    const externalCounts = new Map<string, number>();

    for (const entry of this.pending.values()) {
      known.add(topLevelName(entry.name));

      const dependencies = new Set<SymbolName>();
      const externals = new Set<string>();

      for (const imp of entry.imports) {
        if (isInternal(imp, known)) {
          dependencies.add(imp.name);
        } else {
          const pkg = imp.segments[0] ?? imp.name;
          externals.add(pkg);
          externalCounts.set(pkg, (externalCounts.get(pkg) ?? 0) + 1);
        }
      }

      modules.set(entry.name, {
        name: entry.name,
        file: entry.file,
        language: entry.language,
        dependencies,
        externals,
      });
      moduleGraph.set(entry.name, dependencies);
    }

    const duplicateFunctions = [...this.declaredIn.entries()]
      .filter(([, files]) => files.size > 1)
      .map(([name]) => name);

    return {
      modules,
      moduleGraph,
      externalCounts,
      functions: new Map(this.functions),
      callGraph: new Map(this.calls),
      duplicateFunctions,
      failures: [...this.failures],
      filesParsed: this.parsedFiles,
    };
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error("GraphBuilder already built; create a new builder per analysis session");
    }
  }
}

function isInternal(imp: ImportReference, knownTopLevels: ReadonlySet<string>): boolean {
  const head = imp.segments[0];
  return head !== undefined && knownTopLevels.has(head);
}

export interface BuildContext {
  extractor: SymbolExtractor;
  fs: FileSystem;
  logger: Logger;
  classification: ClassificationMode;
  /** Map a root-relative path to one the FileSystem can read */
  resolvePath: (relativePath: string) => string;
}

/**
 * Read and extract every file, tolerating per-file failures.
 */
export async function buildDependencyGraph(
  files: readonly string[],
  ctx: BuildContext
): Promise<DependencyGraph> {
  const builder = new GraphBuilder({ classification: ctx.classification });

  for (const file of files) {
    const source = ctx.fs.read(ctx.resolvePath(file));
    const extracted = source.ok
      ? andThen(
          await tryCatchAsync(() => ctx.extractor.extract({ path: file, content: source.value })),
          (result) => result
        )
      : source;

    if (!extracted.ok) {
      ctx.logger.warn(`Could not analyze ${file}: ${extracted.error.message}`);
      builder.addFailure(file, extracted.error.message);
      continue;
    }

    builder.addFile(extracted.value);
  }

  return builder.build();
}
