/**
 * insight_fan tool - Most connected symbols or files.
 */

import { z } from "zod";
import { Ok, resultToStructuredResponse } from "@codepulse/core";
import { DEFAULT_FAN_COUNT } from "../fan.js";
import type { FanMode } from "../model.js";
import type { ToolRegistrar } from "./types.js";

interface FanInput {
  mode?: FanMode;
  count?: number;
}

export const registerFan: ToolRegistrar = (server, service) => {
  server.registerTool(
    "insight_fan",
    {
      title: "Fan-in/fan-out",
      description: `Rank symbols or files by fan-in plus fan-out.

Symbol mode reads the precomputed degrees, betweenness and pagerank.
File mode counts distinct importing and imported files. Flags mark hubs
(large fan-in), spreaders (large fan-out) and high-risk nodes (both).`,
      inputSchema: {
        mode: z.enum(["symbol", "file"]).default("symbol").describe("Rank symbols or files"),
        count: z
          .number()
          .int()
          .min(1)
          .default(DEFAULT_FAN_COUNT)
          .describe(`Number of items (default: ${DEFAULT_FAN_COUNT})`),
      },
    },
    async (input: FanInput) => {
      const report = service.fan({ mode: input.mode, count: input.count });

      return resultToStructuredResponse(Ok(report), (value) => {
        const lines = [`Fan-in/fan-out (${value.mode} level)`];
        if (value.mode === "symbol") {
          for (const item of value.items) {
            lines.push(
              `  ${item.name} in ${item.fanIn} out ${item.fanOut} ${item.file}:${item.line}` +
                (item.flag ? ` [${item.flag}]` : "")
            );
          }
        } else {
          for (const item of value.items) {
            lines.push(
              `  ${item.path} in ${item.fanIn} out ${item.fanOut}` + (item.flag ? ` [${item.flag}]` : "")
            );
          }
        }
        if (value.items.length === 0) lines.push("  (no connections)");
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
