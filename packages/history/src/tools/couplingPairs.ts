/**
 * coupling_pairs tool - File pairs that change together most often.
 */

import { z } from "zod";
import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { ToolRegistrar } from "./types.js";

interface CouplingPairsInput {
  count?: number;
}

export const registerCouplingPairs: ToolRegistrar = (server, service) => {
  server.registerTool(
    "coupling_pairs",
    {
      title: "Coupling pairs",
      description:
        "List file pairs that change together most often, with normalized strength " +
        "and whether an import edge explains the coupling.",
      inputSchema: {
        count: z.number().int().min(1).max(200).default(20).describe("Number of pairs to show"),
      },
    },
    async (input: CouplingPairsInput) => {
      const report = service.pairs({ count: input.count ?? 20 });

      return resultToStructuredResponse(Ok(report), (value) => {
        if (value.pairs.length === 0) {
          return { text: "No co-change data available.", data: { ...value } };
        }

        const lines = ["# Temporal coupling", ""];
        for (const pair of value.pairs) {
          const flag = pair.hasStructuralEdge ? "" : " HIDDEN";
          lines.push(
            `- ${pair.fileA} <-> ${pair.fileB}: ${pair.cochangeCount} co-changes, ` +
              `strength ${pair.strength}${flag}`
          );
        }
        if (value.hiddenCouplingCount > 0) {
          lines.push("");
          lines.push(
            `${value.hiddenCouplingCount}/${value.pairs.length} pairs co-change without an import edge.`
          );
        }
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
