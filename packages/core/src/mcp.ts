/**
 * MCP tool response helpers.
 */

import { errorMessage } from "./errors.js";
import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
};

export type ErrorPayload = { success: false; error: string };

/**
 * Error response: `Error: <message>` text plus `{ success: false, error }`.
 */
export function errorResponse(error: string | Error): ToolResponse<ErrorPayload> {
  const message = errorMessage(error);
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result into a tool response; the formatter only sees success values.
 */
export function resultToResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorPayload> {
  if (!result.ok) {
    return errorResponse(result.error);
  }
  const { text, data } = formatter(result.value);
  return successResponse(text, data);
}
