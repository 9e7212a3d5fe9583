/**
 * MCP server bootstrap shared by the workspace's servers.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;

  logger?: Logger;
}

/**
 * Create services, register tools, install SIGINT/SIGTERM handlers and connect stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "structmap:analyzer", version: "0.1.0" },
 *   createServices: () => ({ workspace: new AnalysisWorkspace(...) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = options.logger ?? createLogger(config.name);

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    try {
      await onShutdown?.(services);
      await server.close();
      process.exit(0);
    } catch (error) {
      logger.error("Shutdown failed", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  await onStartup?.(services);

  await server.connect(transport);
  logger.info(`${config.name} v${config.version} listening on stdio`);
}

/**
 * Preferred entry point: bootstrapServer with fatal errors reported and exit code 1.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  const logger = options.logger ?? createLogger(options.config.name);
  bootstrapServer(options).catch((error: unknown) => {
    logger.error("Fatal error", error);
    process.exit(1);
  });
}

export { McpServer };
