export type { Result } from "./result.js";
export { Ok, Err, andThen, toError, tryCatch, tryCatchAsync } from "./result.js";

export { ConfigurationError, errorMessage } from "./errors.js";

export type { LogLevel, Logger } from "./logger.js";
export { createLogger, parseLogLevel, silentLogger } from "./logger.js";

export type { TextContent, ToolResponse, ErrorPayload } from "./mcp.js";
export { errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
