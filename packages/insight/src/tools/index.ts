/**
 * MCP tool registration for insight package.
 */

import type { McpServer } from "@codepulse/core";
import type { InsightService } from "../InsightService.js";

import { registerDeadExports } from "./deadExports.js";
import { registerFan } from "./fan.js";
import { registerHealth } from "./health.js";

export interface Services {
  insight: InsightService;
}

/**
 * Register all insight tools with an MCP server.
 */
export function registerAllTools(server: McpServer, services: Services): void {
  const { insight } = services;

  registerDeadExports(server, insight);
  registerHealth(server, insight);
  registerFan(server, insight);
}

export * from "./types.js";
