/**
 * graph_trace tool - Shortest dependency path between two symbols.
 */

import { z } from "zod";
import { resultToStructuredResponse } from "@codepulse/core";
import type { ToolRegistrar } from "./types.js";

interface TraceInput {
  from: string;
  to: string;
}

export const registerTrace: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_trace",
    {
      title: "Trace path",
      description: "Find the shortest dependency path from one symbol to another.",
      inputSchema: {
        from: z.string().min(1).describe("Starting symbol"),
        to: z.string().min(1).describe("Target symbol"),
      },
    },
    async (input: TraceInput) => {
      return resultToStructuredResponse(service.trace(input.from, input.to), (value) => {
        if (!value.path) {
          return {
            text: `No path from ${value.from.name} to ${value.to.name}`,
            data: { from: value.from, to: value.to, path: null },
          };
        }

        const lines = [`Path (${value.path.length - 1} hop(s)):`];
        for (const step of value.path) {
          const kinds = step.edgeKinds.length > 0 ? ` [${step.edgeKinds.join(", ")}]` : "";
          lines.push(`  ${step.name} ${step.filePath}${kinds}`);
        }
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
