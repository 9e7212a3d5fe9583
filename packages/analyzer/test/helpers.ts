import { Err, Ok, type Logger, type Result } from "@structmap/core";

import { defaultConfig } from "../src/config.js";
import {
  LANGUAGES,
  type ExtractedFile,
  type FunctionDeclaration,
  type ImportReference,
  type LayerMap,
  type SourceFile,
} from "../src/core/model.js";
import type { FileSystem } from "../src/core/ports/FileSystem.js";
import type { ProjectScanner } from "../src/core/ports/ProjectScanner.js";
import type { SymbolExtractor } from "../src/core/ports/SymbolExtractor.js";
import { AnalysisSession } from "../src/core/services/DependencyAnalyzer.js";
import { GraphBuilder } from "../src/core/services/GraphBuilder.js";

/**
 * FileSystem over a map of absolute paths; directories are listed explicitly.
 */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, string>();
  readonly directories = new Set<string>();

  constructor(files: Record<string, string> = {}, directories: string[] = []) {
    for (const [file, content] of Object.entries(files)) this.files.set(file, content);
    for (const dir of directories) this.directories.add(dir);
  }

  read(filePath: string): Result<string, Error> {
    const content = this.files.get(filePath);
    return content === undefined ? Err(new Error(`ENOENT: ${filePath}`)) : Ok(content);
  }

  write(filePath: string, content: string): Result<void, Error> {
    this.files.set(filePath, content);
    return Ok(undefined);
  }

  exists(filePath: string): boolean {
    return this.files.has(filePath) || this.directories.has(filePath);
  }

  isDirectory(filePath: string): boolean {
    return this.directories.has(filePath);
  }
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}

export function imp(name: string, line = 1): ImportReference {
  return { name, segments: name.split("."), line };
}

export function fn(name: string, file: string, calls: string[] = []): FunctionDeclaration {
  return { name, file, params: [], returns: null, line: 1, decorators: [], calls };
}

export function extracted(
  module: string,
  imports: string[],
  functions: FunctionDeclaration[] = []
): ExtractedFile {
  return {
    file: `${module.split(".").join("/")}.py`,
    module,
    language: "python",
    imports: imports.map((name) => imp(name)),
    functions,
  };
}

/**
 * Looks extraction results up by path. Content "BROKEN" fails, "THROW" throws.
 */
export class TableExtractor implements SymbolExtractor {
  constructor(private readonly table: Record<string, ExtractedFile>) {}

  async extract(file: SourceFile): Promise<Result<ExtractedFile, Error>> {
    if (file.content === "BROKEN") return Err(new Error("Syntax error at line 1"));
    if (file.content === "THROW") throw new Error("grammar exploded");
    const entry = this.table[file.path];
    return entry ? Ok(entry) : Err(new Error(`Unsupported file type: ${file.path}`));
  }

  supportedExtensions(): string[] {
    return LANGUAGES.python.extensions;
  }
}

export class ListScanner implements ProjectScanner {
  constructor(private readonly files: string[]) {}

  async scan(): Promise<Result<string[], Error>> {
    return Ok([...this.files]);
  }

  shouldIgnore(): boolean {
    return false;
  }
}

/**
 * a -> b -> c -> a, plus tools.x-y -> a; requests imported twice.
 * login -> verify_token -> login closes a call cycle.
 */
export const SAMPLE_FILES: Record<string, ExtractedFile> = {
  "a.py": extracted(
    "a",
    ["b", "requests"],
    [fn("login", "a.py", ["verify_token", "create_session"]), fn("verify_token", "a.py", ["decode", "login"])]
  ),
  "b.py": extracted("b", ["c", "requests"], [fn("process_payload", "b.py", ["parse_json"])]),
  "c.py": extracted("c", ["a"]),
  "tools/x-y.py": extracted("tools.x-y", ["a", "os"]),
};

export function sampleSession(layers: LayerMap = {}): AnalysisSession {
  const builder = new GraphBuilder({ classification: "pre-index" });
  for (const file of Object.values(SAMPLE_FILES)) {
    builder.addFile(file);
  }
  return new AnalysisSession("/proj", builder.build(), layers, 4, defaultConfig());
}
