#!/usr/bin/env node
/**
 * structmap command line.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { createLogger } from "@structmap/core";

import {
  analyzeCommand,
  DIAGRAM_SELECTIONS,
  PATTERN_KINDS,
  type DiagramSelection,
} from "./commands/analyze.js";
import { DependencyAnalyzer } from "./core/services/DependencyAnalyzer.js";
import type { PatternKind } from "./format.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { TreeSitterExtractor } from "./infrastructure/parsers/TreeSitterExtractor.js";
import { NodeProjectScanner } from "./infrastructure/scanner/NodeProjectScanner.js";
import { VERSION } from "./version.js";
import { AnalysisWorkspace } from "./workspace.js";

interface AnalyzeCliOptions {
  output: string;
  diagrams: DiagramSelection;
  trace?: string;
  depth?: number;
  pattern: PatternKind;
  config?: string;
}

function parseDepth(value: string): number {
  const depth = Number.parseInt(value, 10);
  if (Number.isNaN(depth) || depth < 0) {
    throw new InvalidArgumentError("Depth must be a non-negative integer.");
  }
  return depth;
}

const program = new Command();

program
  .name("structmap")
  .description("Module dependency and call-graph analysis for Python, TypeScript and JavaScript")
  .version(VERSION);

program
  .command("analyze")
  .description("Analyze a source tree and write the analysis JSON and Mermaid diagrams")
  .argument("<path>", "Root directory to analyze")
  .option("-o, --output <prefix>", "Output file prefix", "structmap")
  .addOption(
    new Option("--diagrams <kind>", "Which dependency diagrams to write")
      .choices(DIAGRAM_SELECTIONS)
      .default("all")
  )
  .option("-t, --trace <function>", "Trace the call flow from this function")
  .option("-d, --depth <n>", "Maximum trace depth (default: configured, 5)", parseDepth)
  .addOption(
    new Option("--pattern <kind>", "Function patterns to report")
      .choices(PATTERN_KINDS)
      .default("all")
  )
  .option("-c, --config <file>", "Config file (default: <path>/structmap.config.json)")
  .action(async (rootPath: string, options: AnalyzeCliOptions) => {
    const logger = createLogger("structmap");
    const fs = new NodeFileSystem();
    const analyzer = new DependencyAnalyzer({
      fs,
      scanner: new NodeProjectScanner(),
      extractor: new TreeSitterExtractor(),
      logger,
    });
    const workspace = new AnalysisWorkspace({
      analyzer,
      fs,
      defaultRoot: process.cwd(),
      env: process.env,
      configPath: options.config,
      logger,
    });

    const result = await analyzeCommand(
      rootPath,
      {
        output: options.output,
        diagrams: options.diagrams,
        trace: options.trace,
        depth: options.depth,
        pattern: options.pattern,
      },
      { workspace, fs, print: (line) => console.log(line) }
    );

    if (!result.ok) {
      logger.error("Analysis failed", result.error);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  createLogger("structmap").error("Fatal error", error);
  process.exit(1);
});
