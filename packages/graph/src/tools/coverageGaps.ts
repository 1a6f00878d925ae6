/**
 * graph_coverage_gaps tool - Entry points with no gate symbol in their call chain.
 */

import { z } from "zod";
import { resultToStructuredResponse } from "@codepulse/core";
import { DEFAULT_MAX_HOPS } from "../traversal.js";
import type { ToolRegistrar } from "./types.js";

interface CoverageGapsInput {
  gates?: string[];
  gate_pattern?: string;
  scope?: string[];
  entry_pattern?: string;
  max_depth?: number;
}

export const registerCoverageGaps: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_coverage_gaps",
    {
      title: "Coverage gaps",
      description: `Find exported top-level functions that never reach a gate symbol.

A gate is a symbol every entry point should pass through, such as an auth
check. Each entry is searched breadth-first over call/uses edges; the
shortest chain to any gate marks it covered.`,
      inputSchema: {
        gates: z.array(z.string()).optional().describe("Gate symbol names (e.g. requireUser)"),
        gate_pattern: z.string().optional().describe("Regular expression over gate names"),
        scope: z
          .array(z.string())
          .optional()
          .describe("File globs for entry points (default: all files)"),
        entry_pattern: z.string().optional().describe("Regular expression over entry names"),
        max_depth: z
          .number()
          .int()
          .min(0)
          .optional()
          .describe(`Maximum call depth (default: ${DEFAULT_MAX_HOPS})`),
      },
    },
    async (input: CoverageGapsInput) => {
      const coverage = service.coverageGaps({
        names: input.gates,
        pattern: input.gate_pattern,
        scope: input.scope,
        namePattern: input.entry_pattern,
        maxDepth: input.max_depth,
      });

      return resultToStructuredResponse(coverage, (value) => {
        const { summary } = value;
        const lines = [
          `${summary.covered}/${summary.totalEntries} entry point(s) covered (${summary.coveragePct}%)`,
          "",
          "Uncovered:",
        ];
        for (const item of value.uncovered) {
          lines.push(`  ${item.name} ${item.file}:${item.line} (${item.reason})`);
        }
        if (value.uncovered.length === 0) lines.push("  (none)");
        lines.push("", "Covered:");
        for (const item of value.covered) {
          lines.push(`  ${item.name} ${item.file}:${item.line} via ${item.gate} (depth ${item.depth})`);
        }
        if (value.covered.length === 0) lines.push("  (none)");
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
