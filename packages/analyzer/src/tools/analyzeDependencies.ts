/**
 * analyze_dependencies - Analyse a source tree and store the session.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse, type ToolResponse } from "@structmap/core";

import type { AnalysisDocument } from "../core/model.js";
import { formatAnalysisSummary } from "../format.js";
import type { AnalysisWorkspace } from "../workspace.js";
import { AnalysisDocumentSchema } from "./schemas.js";

interface AnalyzeDependenciesInput {
  path?: string;
}

interface AnalyzeDependenciesOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  analysis?: AnalysisDocument;
}

export function registerAnalyzeDependencies(server: McpServer, workspace: AnalysisWorkspace): void {
  server.registerTool(
    "analyze_dependencies",
    {
      title: "Analyze dependencies",
      description: `Analyze module imports and function calls of a Python, TypeScript or JavaScript tree.

Returns:
- Module dependency graph and external package usage counts
- Package-level (top-level namespace) dependencies
- Circular dependencies and strongly connected module groups
- Fan-in / fan-out hot spots
- Call graph and authentication / data-processing candidates

The session is kept for trace_flow, find_patterns and render_diagram.`,
      inputSchema: {
        path: z.string().optional().describe("Root directory to analyze (default: server working directory)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        analysis: AnalysisDocumentSchema.optional(),
      },
    },
    async (input: AnalyzeDependenciesInput): Promise<ToolResponse<AnalyzeDependenciesOutput>> => {
      const result = await workspace.analyze(input.path);

      return resultToResponse(result, (session) => {
        const analysis = session.toDocument();
        return { text: formatAnalysisSummary(analysis), data: { analysis } };
      });
    }
  );
}
