import type { Result } from "@structmap/core";

import type { ExtractedFile, SourceFile } from "../model.js";

/**
 * Port for turning one source file into imports and per-function call lists.
 * The graph builder only ever sees this interface.
 */
export interface SymbolExtractor {
  /**
   * Extract imports and function declarations.
   *
   * @param file - Root-relative path and its content
   * @returns Extracted symbols, or an error for unsupported or malformed source
   */
  extract(file: SourceFile): Promise<Result<ExtractedFile, Error>>;

  /**
   * File extensions this extractor understands (e.g. [".py", ".ts"]).
   */
  supportedExtensions(): string[];
}
