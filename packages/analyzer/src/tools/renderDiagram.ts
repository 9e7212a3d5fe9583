/**
 * render_diagram - Mermaid text for the stored session.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type Result, Err, Ok, resultToResponse, type ToolResponse, andThen } from "@structmap/core";

import type { AnalysisSession } from "../core/services/DependencyAnalyzer.js";
import {
  renderArchitectureDiagram,
  renderCallGraph,
  renderCycleDiagram,
  renderExternalChart,
  renderFlowchart,
  renderModuleDiagram,
  renderPackageDiagram,
} from "../diagrams/mermaid.js";
import type { AnalysisWorkspace } from "../workspace.js";
import { DiagramKindSchema, type DiagramKind } from "./schemas.js";

interface RenderDiagramInput {
  kind: DiagramKind;
  function?: string;
  depth?: number;
}

interface RenderDiagramOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  kind?: DiagramKind;
  diagram?: string;
}

export function renderSessionDiagram(
  session: AnalysisSession,
  input: RenderDiagramInput
): Result<string, Error> {
  const doc = session.toDocument();

  switch (input.kind) {
    case "package":
      return Ok(renderPackageDiagram(doc));
    case "module":
      return Ok(renderModuleDiagram(doc));
    case "circular":
      return Ok(renderCycleDiagram(doc));
    case "external":
      return Ok(renderExternalChart(doc));
    case "architecture":
      return Ok(renderArchitectureDiagram(doc.layers));
    case "flow":
      if (!input.function) {
        return Err(new Error("function is required for flow diagrams"));
      }
      return Ok(renderFlowchart(session.trace(input.function, input.depth).flow));
    case "call_graph":
      return Ok(renderCallGraph(doc.callGraph, input.function ? [input.function] : undefined));
  }
}

export function registerRenderDiagram(server: McpServer, workspace: AnalysisWorkspace): void {
  server.registerTool(
    "render_diagram",
    {
      title: "Render Mermaid diagram",
      description: `Render a Mermaid diagram from the stored analysis.

Kinds:
- package: top-level namespace dependencies
- module: dependencies of the highest fan-out modules
- circular: the first 5 circular dependencies
- external: pie chart of the most used external packages
- architecture: detected layers (controllers, services, ...)
- flow: call tree below \`function\` (requires function)
- call_graph: call edges of \`function\`, or of the busiest callers`,
      inputSchema: {
        kind: DiagramKindSchema.describe("Diagram to render"),
        function: z.string().optional().describe("Function for flow and call_graph diagrams"),
        depth: z.number().int().min(0).max(50).optional().describe("Trace depth for flow diagrams"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        kind: DiagramKindSchema.optional(),
        diagram: z.string().optional(),
      },
    },
    async (input: RenderDiagramInput): Promise<ToolResponse<RenderDiagramOutput>> => {
      const session = await workspace.ensureSession();
      const diagram = andThen(session, (s) => renderSessionDiagram(s, input));

      return resultToResponse(diagram, (text) => ({
        text: ["```mermaid", text, "```"].join("\n"),
        data: { kind: input.kind, diagram: text },
      }));
    }
  );
}
