/**
 * Shared types for history tool registration.
 */

import type { McpServer } from "@codepulse/core";
import type { CouplingService } from "../core/CouplingService.js";

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, service: CouplingService): void;
}
