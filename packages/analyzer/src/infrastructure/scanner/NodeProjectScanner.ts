import fs from "node:fs";
import path from "node:path";

import { type Result, Ok, Err, toError } from "@structmap/core";

import type { ProjectScanner, ScanOptions } from "../../core/ports/ProjectScanner.js";
import { toPosixPath } from "../../core/moduleNames.js";

// Generated or declaration-only files are never source
const ALWAYS_IGNORE_PATTERNS = [/\.min\.[jt]s$/, /\.bundle\.[jt]s$/, /\.d\.[cm]?ts$/];

const TEST_FILE_PATTERNS = [
  /(^|\/)test_[^/]*\.py$/,
  /_test\.py$/,
  /\.test\.[cm]?[jt]sx?$/,
  /\.spec\.[cm]?[jt]sx?$/,
  /(^|\/)(tests|__tests__|__mocks__)(\/|$)/,
];

/**
 * Node.js implementation of ProjectScanner.
 * Recursively scans directories, skipping excluded directory names at any depth.
 */
export class NodeProjectScanner implements ProjectScanner {
  async scan(rootPath: string, options: ScanOptions): Promise<Result<string[], Error>> {
    try {
      const files: string[] = [];
      const extSet = new Set(options.extensions.map((e) => e.toLowerCase()));

      await this.scanDirectory(rootPath, rootPath, extSet, options, files);

      return Ok(files.sort());
    } catch (error) {
      return Err(toError(error));
    }
  }

  shouldIgnore(relativePath: string, options: ScanOptions): boolean {
    const posix = toPosixPath(relativePath);
    const excluded = new Set(options.excludeDirs);

    for (const part of posix.split("/")) {
      if (excluded.has(part)) {
        return true;
      }
    }

    if (ALWAYS_IGNORE_PATTERNS.some((pattern) => pattern.test(posix))) {
      return true;
    }

    return options.skipTestFiles && TEST_FILE_PATTERNS.some((pattern) => pattern.test(posix));
  }

  private async scanDirectory(
    rootPath: string,
    currentPath: string,
    extensions: Set<string>,
    options: ScanOptions,
    results: string[]
  ): Promise<void> {
    const entries = await fs.promises.readdir(currentPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);
      const relativePath = toPosixPath(path.relative(rootPath, fullPath));

      if (this.shouldIgnore(relativePath, options)) {
        continue;
      }

      if (entry.isDirectory()) {
        await this.scanDirectory(rootPath, fullPath, extensions, options, results);
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (extensions.has(ext)) {
          results.push(relativePath);
        }
      }
    }
  }
}
