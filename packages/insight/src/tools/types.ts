/**
 * Tool registration types for insight package.
 */

import type { McpServer } from "@codepulse/core";
import type { InsightService } from "../InsightService.js";

export type ToolRegistrar = (server: McpServer, service: InsightService) => void;
