/**
 * find_patterns - Keyword-labelled function candidates.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse, type ToolResponse } from "@structmap/core";

import { formatPatterns, selectPatterns, type PatternKind } from "../format.js";
import type { AnalysisWorkspace } from "../workspace.js";
import { PatternKindSchema } from "./schemas.js";

interface FindPatternsInput {
  pattern: PatternKind;
}

interface FindPatternsOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  authenticationFunctions?: string[];
  dataProcessingFunctions?: string[];
}

export function registerFindPatterns(server: McpServer, workspace: AnalysisWorkspace): void {
  server.registerTool(
    "find_patterns",
    {
      title: "Find function patterns",
      description: `List functions whose names suggest authentication or data processing.

Case-insensitive substring match against configurable keyword lists
(defaults: auth, login, token, verify, authenticate, session /
process, transform, parse, validate, sanitize, format). Heuristic only.`,
      inputSchema: {
        pattern: PatternKindSchema.describe("Which lists to return"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        authenticationFunctions: z.array(z.string()).optional(),
        dataProcessingFunctions: z.array(z.string()).optional(),
      },
    },
    async (input: FindPatternsInput): Promise<ToolResponse<FindPatternsOutput>> => {
      const session = await workspace.ensureSession();

      return resultToResponse(session, (s) => {
        const patterns = selectPatterns(s.patterns, input.pattern);
        return { text: formatPatterns(patterns), data: { ...patterns } };
      });
    }
  );
}
