import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { AnalysisWorkspace } from "../workspace.js";
import { registerAnalyzeDependencies } from "./analyzeDependencies.js";
import { registerFindPatterns } from "./findPatterns.js";
import { registerRenderDiagram } from "./renderDiagram.js";
import { registerTraceFlow } from "./traceFlow.js";

export interface Services {
  workspace: AnalysisWorkspace;
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerAnalyzeDependencies(server, services.workspace);

  // Queries against the stored session; analyse the workspace root on first use
  registerTraceFlow(server, services.workspace);
  registerFindPatterns(server, services.workspace);
  registerRenderDiagram(server, services.workspace);
}

export { renderSessionDiagram } from "./renderDiagram.js";
export * from "./schemas.js";
