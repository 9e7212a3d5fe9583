#!/usr/bin/env node
/**
 * MCP server for dependency and call-graph analysis.
 */

import { createLogger, runServer } from "@structmap/core";

import { DependencyAnalyzer } from "./core/services/DependencyAnalyzer.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { TreeSitterExtractor } from "./infrastructure/parsers/TreeSitterExtractor.js";
import { NodeProjectScanner } from "./infrastructure/scanner/NodeProjectScanner.js";
import { type Services, registerAllTools } from "./tools/index.js";
import { VERSION } from "./version.js";
import { AnalysisWorkspace } from "./workspace.js";

const logger = createLogger("structmap:analyzer");

runServer<Services>({
  config: {
    name: "structmap:analyzer",
    version: VERSION,
  },
  logger,
  createServices: () => {
    const fs = new NodeFileSystem();
    const analyzer = new DependencyAnalyzer({
      fs,
      scanner: new NodeProjectScanner(),
      extractor: new TreeSitterExtractor(),
      logger,
    });

    return {
      workspace: new AnalysisWorkspace({
        analyzer,
        fs,
        defaultRoot: process.cwd(),
        env: process.env,
        logger,
      }),
    };
  },
  registerTools: registerAllTools,
});
