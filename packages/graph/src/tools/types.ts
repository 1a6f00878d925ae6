/**
 * Shared types for graph tool registration.
 */

import type { McpServer } from "@codepulse/core";
import type { SymbolRecord } from "@codepulse/store";
import type { GraphService } from "../infrastructure/GraphService.js";

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, service: GraphService): void;
}

export function formatSymbol(symbol: SymbolRecord): string {
  return `${symbol.name} (${symbol.kind}) ${symbol.filePath}:${symbol.lineStart}`;
}
