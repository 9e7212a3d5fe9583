import { Err, Ok, type Result, toError } from "@structmap/core";
import Parser from "tree-sitter";

import { LANGUAGES, type ExtractedFile, type Language, type SourceFile, detectLanguage } from "../../core/model.js";
import { moduleNameFromPath } from "../../core/moduleNames.js";
import type { SymbolExtractor } from "../../core/ports/SymbolExtractor.js";
import { findFunctions } from "./FunctionExtractor.js";
import { findImports } from "./ImportExtractor.js";

// Tree-sitter language type (uses any in the typings)
type TreeSitterLanguage = unknown;

// Language grammars - dynamically imported
type GrammarLoader = () => Promise<TreeSitterLanguage>;

type GrammarKey = "python" | "typescript" | "tsx" | "javascript";

const GRAMMAR_LOADERS: Record<GrammarKey, GrammarLoader> = {
  typescript: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.typescript;
  },
  tsx: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.tsx;
  },
  javascript: async () => {
    const mod = await import("tree-sitter-javascript");
    return mod.default;
  },
  python: async () => {
    const mod = await import("tree-sitter-python");
    return mod.default;
  },
};

/**
 * First ERROR or MISSING node, depth-first.
 */
export function findSyntaxError(node: Parser.SyntaxNode): string | null {
  if (node.type === "ERROR" || node.isMissing) {
    const line = node.startPosition.row + 1;
    return node.isMissing ? `Missing ${node.type} at line ${line}` : `Syntax error at line ${line}`;
  }
  if (!node.hasError) return null;

  for (const child of node.children) {
    const error = findSyntaxError(child);
    if (error) return error;
  }
  return null;
}

/**
 * Tree-sitter based SymbolExtractor for Python, TypeScript and JavaScript.
 * A file with any syntax error is rejected as a whole.
 */
export class TreeSitterExtractor implements SymbolExtractor {
  private readonly parser: Parser;
  private readonly loadedGrammars = new Map<GrammarKey, TreeSitterLanguage>();

  constructor() {
    this.parser = new Parser();
  }

  async extract(file: SourceFile): Promise<Result<ExtractedFile, Error>> {
    const lang = detectLanguage(file.path);
    if (!lang) {
      return Err(new Error(`Unsupported file type: ${file.path}`));
    }

    try {
      const grammar = await this.getGrammar(lang, file.path);
      this.parser.setLanguage(grammar);

      // The default parse buffer rejects inputs over 32767 characters.
      const tree = this.parser.parse(file.content, undefined, {
        bufferSize: file.content.length * 2 + 1,
      });
      const syntaxError = findSyntaxError(tree.rootNode);
      if (syntaxError) {
        return Err(new Error(syntaxError));
      }

      return Ok({
        file: file.path,
        module: moduleNameFromPath(file.path, lang),
        language: lang.id,
        imports: findImports(tree.rootNode, lang.id, file.path),
        functions: findFunctions(tree.rootNode, lang.id, file.path),
      });
    } catch (error) {
      return Err(toError(error));
    }
  }

  supportedExtensions(): string[] {
    return Object.values(LANGUAGES).flatMap((lang) => lang.extensions);
  }

  private async getGrammar(lang: Language, filePath: string): Promise<TreeSitterLanguage> {
    // Handle TSX files specially
    const grammarKey: GrammarKey =
      lang.id === "typescript" && filePath.toLowerCase().endsWith(".tsx") ? "tsx" : lang.id;

    const cached = this.loadedGrammars.get(grammarKey);
    if (cached) return cached;

    const grammar = await GRAMMAR_LOADERS[grammarKey]();
    this.loadedGrammars.set(grammarKey, grammar);
    return grammar;
  }
}
