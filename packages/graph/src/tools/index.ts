/**
 * MCP tool registration for graph package.
 */

import type { McpServer } from "@codepulse/core";
import type { GraphService } from "../infrastructure/GraphService.js";

import { registerCycles } from "./cycles.js";
import { registerLayers } from "./layers.js";
import { registerBlastRadius } from "./blastRadius.js";
import { registerAffectedTests } from "./affectedTests.js";
import { registerEntryPoints } from "./entryPoints.js";
import { registerCoverageGaps } from "./coverageGaps.js";
import { registerTrace } from "./trace.js";

export interface Services {
  graph: GraphService;
}

/**
 * Register all graph tools with an MCP server.
 */
export function registerAllTools(server: McpServer, services: Services): void {
  const { graph } = services;

  // Structure
  registerCycles(server, graph);
  registerLayers(server, graph);

  // Reachability
  registerBlastRadius(server, graph);
  registerAffectedTests(server, graph);
  registerEntryPoints(server, graph);
  registerCoverageGaps(server, graph);
  registerTrace(server, graph);
}

export * from "./types.js";
