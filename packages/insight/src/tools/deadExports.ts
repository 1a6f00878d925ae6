/**
 * insight_dead_exports tool - Exported symbols nothing uses.
 */

import { z } from "zod";
import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { DeadExport, DeadGroupBy } from "../model.js";
import type { ToolRegistrar } from "./types.js";

interface DeadExportsInput {
  max_hops?: number;
  group_by?: DeadGroupBy;
  include_low?: boolean;
}

function formatExport(item: DeadExport): string {
  return `  ${item.name} (${item.kind}) ${item.file}:${item.line}`;
}

export const registerDeadExports: ToolRegistrar = (server, service) => {
  server.registerTool(
    "insight_dead_exports",
    {
      title: "Dead exports",
      description:
        "List exported symbols with no references. Exports of imported files are checked " +
        "through re-export chains before being reported with high confidence.",
      inputSchema: {
        max_hops: z
          .number()
          .int()
          .min(0)
          .max(10)
          .default(3)
          .describe("Importer hops to follow through re-exports"),
        group_by: z.enum(["directory", "kind"]).optional().describe("Group high-confidence results"),
        include_low: z
          .boolean()
          .default(false)
          .describe("Include exports of files nothing imports"),
      },
    },
    async (input: DeadExportsInput) => {
      const analysis = service.deadExports({
        maxHops: input.max_hops ?? 3,
        groupBy: input.group_by,
      });
      const low = input.include_low ? analysis.low : [];

      return resultToStructuredResponse(Ok(analysis), (value) => {
        const lines = [
          `${value.high.length} high confidence, ${value.low.length} low, ` +
            `${value.revived.length} alive through re-exports`,
        ];

        if (value.groups) {
          for (const group of value.groups) {
            lines.push("", `${group.key} (${group.count})`);
            lines.push(...group.symbols.map(formatExport));
          }
        } else if (value.high.length > 0) {
          lines.push("", "High confidence:");
          lines.push(...value.high.map(formatExport));
        }

        if (low.length > 0) {
          lines.push("", "Low confidence (file has no importers):");
          lines.push(...low.map(formatExport));
        }
        if (value.unparsedFiles > 0) {
          lines.push("", `Note: ${value.unparsedFiles} file(s) had no symbols extracted`);
        }

        return { text: lines.join("\n"), data: { ...value, low } };
      });
    }
  );
};
