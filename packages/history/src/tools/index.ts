/**
 * MCP tool registration for history package.
 */

import type { McpServer } from "@codepulse/core";
import type { CouplingService } from "../core/CouplingService.js";

import { registerCouplingPairs } from "./couplingPairs.js";
import { registerCouplingSets } from "./couplingSets.js";
import { registerCouplingAgainst } from "./couplingAgainst.js";

export interface Services {
  coupling: CouplingService;
}

/**
 * Register all history tools with an MCP server.
 */
export function registerAllTools(server: McpServer, services: Services): void {
  const { coupling } = services;

  registerCouplingPairs(server, coupling);
  registerCouplingSets(server, coupling);
  registerCouplingAgainst(server, coupling);
}

export * from "./types.js";
