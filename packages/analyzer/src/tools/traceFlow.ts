/**
 * trace_flow - Call tree below a function in the stored session.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse, type ToolResponse } from "@structmap/core";

import type { FlowDocument } from "../core/model.js";
import { formatFlowTree } from "../format.js";
import type { AnalysisWorkspace } from "../workspace.js";
import { FlowDocumentSchema } from "./schemas.js";

interface TraceFlowInput {
  function: string;
  depth?: number;
}

interface TraceFlowOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  trace?: FlowDocument;
}

export function registerTraceFlow(server: McpServer, workspace: AnalysisWorkspace): void {
  server.registerTool(
    "trace_flow",
    {
      title: "Trace call flow",
      description: `Trace the call tree starting at a function, by bare function name.

Each function is expanded once per trace; later occurrences appear as leaves,
so recursive call chains terminate. An unknown name yields a single-node tree.

Analyzes the server working directory first when no analysis has been run.

Example: trace_flow("login", 3)`,
      inputSchema: {
        function: z.string().min(1).describe("Function to start from"),
        depth: z.number().int().min(0).max(50).optional().describe("Maximum depth (default: configured trace depth, 5)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        trace: FlowDocumentSchema.optional(),
      },
    },
    async (input: TraceFlowInput): Promise<ToolResponse<TraceFlowOutput>> => {
      const session = await workspace.ensureSession();

      return resultToResponse(session, (s) => {
        const trace = s.trace(input.function, input.depth);
        const text = [
          `## Flow from ${trace.start} (max depth ${trace.maxDepth})`,
          "",
          "```",
          formatFlowTree(trace.flow),
          "```",
        ].join("\n");
        return { text, data: { trace } };
      });
    }
  );
}
