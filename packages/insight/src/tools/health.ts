/**
 * insight_health tool - Cycles, god components, bottlenecks and a health score.
 */

import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { ToolRegistrar } from "./types.js";

export const registerHealth: ToolRegistrar = (server, service) => {
  server.registerTool(
    "insight_health",
    {
      title: "Code health",
      description:
        "Score codebase health from 0 to 100 using cycles, god components, " +
        "bottlenecks, dead exports and layer violations.",
      inputSchema: {},
    },
    async () => {
      return resultToStructuredResponse(Ok(service.health()), (report) => {
        const { metrics } = report;
        const lines = [
          `Health: ${metrics.healthScore}/100`,
          `${metrics.files} files, ${metrics.symbols} symbols, ${metrics.edges} edges`,
          `Cycles: ${metrics.cycles} (tangle ${metrics.tangleRatio}%)`,
          `God components: ${metrics.godComponents}`,
          `Bottlenecks: ${metrics.bottlenecks}`,
          `Dead exports: ${metrics.deadExports}`,
          report.layerViolations
            ? `Layer violations: ${metrics.layerViolations}`
            : "Layer violations: no layers detected",
        ];
        return { text: lines.join("\n"), data: { ...report } };
      });
    }
  );
};
