/**
 * MCP (Model Context Protocol) response utilities.
 * Every analysis tool answers with a short text summary plus structured content.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure.
 */
export type ToolResponse = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

/**
 * Create a simple text response.
 */
export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Create an error response from a string message. Extra details (an error
 * kind, candidate lists) are merged into the structured content.
 */
export function errorResponse(message: string, details: Record<string, unknown> = {}): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { ...details, success: false, error: message },
    isError: true,
  };
}

/**
 * Anything a service can hand back as an error: plain strings, Errors, or
 * tagged objects that describe themselves.
 */
export type DescribableError = string | Error | { message: string };

function describe(error: DescribableError): string {
  return typeof error === "string" ? error : error.message;
}

/**
 * Fields of a tagged error besides its message.
 */
function detailsOf(error: DescribableError): Record<string, unknown> {
  if (typeof error === "string" || error instanceof Error) return {};
  const { message, ...details } = error;
  return details;
}

/**
 * Convert a Result to an MCP tool response with structured data.
 * On success, calls the formatter to generate text and structured content.
 */
export function resultToStructuredResponse<T, E extends DescribableError>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: Record<string, unknown> }
): ToolResponse {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { success: true, ...data },
    };
  }
  return errorResponse(describe(result.error), detailsOf(result.error));
}
