/**
 * MCP tool response helpers.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Result } from "./result.js";

export type { CallToolResult };

/**
 * Plain text response.
 */
export function textResponse(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

/**
 * Error response; the text is prefixed with "Error:" and flagged for the client.
 */
export function errorResponse(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Convert a Result into a tool response.
 * Success goes through `format`; failure goes through `describe` (or the
 * error's message) into an error response.
 */
export function resultToResponse<T, E>(
  result: Result<T, E>,
  format: (value: T) => string,
  describe: (error: E) => string = describeError
): CallToolResult {
  if (result.ok) {
    return textResponse(format(result.value));
  }
  return errorResponse(describe(result.error));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
