/**
 * graph_blast_radius tool - Everything that transitively depends on a symbol.
 */

import { z } from "zod";
import { resultToStructuredResponse } from "@codepulse/core";
import { formatSymbol, type ToolRegistrar } from "./types.js";

interface BlastRadiusInput {
  symbol: string;
}

export const registerBlastRadius: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_blast_radius",
    {
      title: "Blast radius",
      description: "Count the symbols and files that transitively depend on a symbol.",
      inputSchema: {
        symbol: z.string().min(1).describe("Symbol name or qualified name"),
      },
    },
    async (input: BlastRadiusInput) => {
      return resultToStructuredResponse(service.blastRadius(input.symbol), ({ symbol, result }) => ({
        text:
          `${formatSymbol(symbol)}\n` +
          `${result.dependentSymbols} dependent symbol(s) in ${result.dependentFiles} file(s)`,
        data: { symbol, ...result },
      }));
    }
  );
};
