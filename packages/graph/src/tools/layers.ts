/**
 * graph_layers tool - Topological layers and cross-layer edges.
 */

import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { ToolRegistrar } from "./types.js";

export const registerLayers: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_layers",
    {
      title: "Detect layers",
      description:
        "Assign each symbol a dependency layer (cycles count as one unit) and list " +
        "edges that point into a higher layer.",
      inputSchema: {},
    },
    async () => {
      const analysis = service.layers();

      return resultToStructuredResponse(Ok(analysis), (value) => {
        const { summary, violations } = value;
        if (summary.totalLayers === 0) {
          return { text: "No layers detected (graph is empty).", data: { ...value } };
        }

        const lines = [
          `${summary.totalLayers} layer(s), shape: ${summary.shape} (${summary.baseLayerPct}% in layer 0)`,
        ];
        for (const layer of summary.layers) {
          lines.push(`  Layer ${layer.layer}: ${layer.symbols.length} symbol(s)`);
        }
        lines.push(`${violations.length} violation(s)`);
        for (const v of violations.slice(0, 20)) {
          lines.push(`  ${v.sourceName} (L${v.sourceLayer}) -> ${v.targetName} (L${v.targetLayer})`);
        }
        if (value.deepestChain) {
          lines.push(`Deepest chain: ${value.deepestChain.join(" -> ")}`);
        }
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
