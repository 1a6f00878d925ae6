/**
 * coupling_sets tool - Recurring change sets of three or more files.
 */

import { z } from "zod";
import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { ToolRegistrar } from "./types.js";

interface CouplingSetsInput {
  count?: number;
  min_occurrences?: number;
}

export const registerCouplingSets: ToolRegistrar = (server, service) => {
  server.registerTool(
    "coupling_sets",
    {
      title: "Recurring change sets",
      description: "Find sets of 3+ files that were committed together more than once.",
      inputSchema: {
        count: z.number().int().min(1).max(200).default(20).describe("Number of sets to show"),
        min_occurrences: z
          .number()
          .int()
          .min(1)
          .default(2)
          .describe("Minimum number of commits with the same file set"),
      },
    },
    async (input: CouplingSetsInput) => {
      const sets = service.sets({
        count: input.count ?? 20,
        minOccurrences: input.min_occurrences ?? 2,
      });

      return resultToStructuredResponse(Ok(sets), (value) => {
        if (value.length === 0) {
          return { text: "No recurring change sets found.", data: { count: 0, sets: [] } };
        }

        const lines = ["# Recurring change sets", ""];
        for (const set of value) {
          const shown = set.files.slice(0, 4).join(", ");
          const more = set.files.length > 4 ? ` (+${set.files.length - 4})` : "";
          lines.push(
            `- ${set.occurrences}x, ${set.size} files, ${set.structuralCouplingPct}% structural: ` +
              `${shown}${more}`
          );
        }
        return { text: lines.join("\n"), data: { count: value.length, sets: value } };
      });
    }
  );
};
