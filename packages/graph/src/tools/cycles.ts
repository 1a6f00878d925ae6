/**
 * graph_cycles tool - Strongly connected components with a suggested edge to break.
 */

import { z } from "zod";
import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { ToolRegistrar } from "./types.js";

interface CyclesInput {
  min_size?: number;
}

export const registerCycles: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_cycles",
    {
      title: "Find cycles",
      description:
        "Find dependency cycles (strongly connected components) in the symbol graph, " +
        "largest first, each with a suggested edge to remove.",
      inputSchema: {
        min_size: z.number().int().min(1).optional().describe("Minimum cycle size (default: 2)"),
      },
    },
    async (input: CyclesInput) => {
      const analysis = service.cycles(input.min_size ?? 2);

      return resultToStructuredResponse(Ok(analysis), (value) => {
        const lines = [
          `${value.cycles.length} cycle(s), ` +
            `${value.symbolsInCycles} of ${value.totalSymbols} symbols involved`,
        ];
        for (const cycle of value.cycles) {
          lines.push("");
          lines.push(`[${cycle.label}] ${cycle.size} symbols in ${cycle.files.length} file(s)`);
          lines.push(`  ${cycle.symbols.map((s) => s.name).join(" -> ")}`);
          const weakest = cycle.weakestEdge;
          if (weakest) {
            lines.push(`  Break: ${weakest.source} -> ${weakest.target} (${weakest.reason})`);
          }
        }
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
