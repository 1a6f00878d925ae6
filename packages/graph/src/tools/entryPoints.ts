/**
 * graph_entry_points tool - Entry points from which a symbol is reachable.
 */

import { z } from "zod";
import { resultToStructuredResponse } from "@codepulse/core";
import { DEFAULT_ENTRY_POINT_LIMIT } from "../traversal.js";
import { formatSymbol, type ToolRegistrar } from "./types.js";

interface EntryPointsInput {
  symbol: string;
  limit?: number;
}

export const registerEntryPoints: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_entry_points",
    {
      title: "Entry points reaching",
      description:
        "Find uncalled functions, methods and classes whose call chains reach a symbol.",
      inputSchema: {
        symbol: z.string().min(1).describe("Symbol name or qualified name"),
        limit: z
          .number()
          .int()
          .min(1)
          .optional()
          .describe(`Maximum entry points (default: ${DEFAULT_ENTRY_POINT_LIMIT})`),
      },
    },
    async (input: EntryPointsInput) => {
      const result = service.entryPoints(input.symbol, { limit: input.limit });

      return resultToStructuredResponse(result, ({ symbol, result: entryPoints }) => {
        const lines = [`${formatSymbol(symbol)}`, `${entryPoints.length} entry point(s)`];
        for (const entry of entryPoints) {
          lines.push(`  ${entry.name} (${entry.kind}) ${entry.filePath}, ${entry.hops} hop(s)`);
        }
        return { text: lines.join("\n"), data: { symbol, entryPoints } };
      });
    }
  );
};
