import type { Result } from "@structmap/core";

export interface ScanOptions {
  /** File extensions to include (e.g., [".py", ".ts"]) */
  extensions: string[];
  /** Directory names skipped at any depth */
  excludeDirs: string[];
  /** Skip test files (test_*.py, *_test.py, *.test.ts, *.spec.ts, tests/ directories) */
  skipTestFiles: boolean;
}

/**
 * Port for discovering files in a project.
 */
export interface ProjectScanner {
  /**
   * @returns Root-relative, "/"-separated paths in a stable (sorted) order
   */
  scan(rootPath: string, options: ScanOptions): Promise<Result<string[], Error>>;

  shouldIgnore(relativePath: string, options: ScanOptions): boolean;
}
