/**
 * coupling_against tool - Check a change against its files' usual co-change partners.
 */

import { z } from "zod";
import { Ok, resultToStructuredResponse } from "@codepulse/core";
import type { CouplingPartner } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";

interface CouplingAgainstInput {
  paths: string[];
  top_n?: number;
  min_cochanges?: number;
  min_strength?: number;
}

function formatPartner(partner: CouplingPartner): string {
  return (
    `  ${partner.path} (${partner.cochangeCount} co-changes, strength ${partner.strength}) ` +
    `via ${partner.via.join(", ")}`
  );
}

export const registerCouplingAgainst: ToolRegistrar = (server, service) => {
  server.registerTool(
    "coupling_against",
    {
      title: "Coupling against a change",
      description:
        "Given the files of a change, list historical co-change partners that are " +
        "included in the change and those that are missing from it.",
      inputSchema: {
        paths: z.array(z.string().min(1)).min(1).describe("Changed file paths"),
        top_n: z.number().int().min(1).max(100).default(10).describe("Partners per changed file"),
        min_cochanges: z.number().int().min(0).default(2).describe("Minimum co-change count"),
        min_strength: z.number().min(0).default(0.3).describe("Minimum normalized strength"),
      },
    },
    async (input: CouplingAgainstInput) => {
      const report = service.against(input.paths, {
        topN: input.top_n ?? 10,
        minCochanges: input.min_cochanges ?? 2,
        minStrength: input.min_strength ?? 0.3,
      });

      return resultToStructuredResponse(Ok(report), (value) => {
        const lines = [`${value.resolved.length} changed file(s) resolved`];
        if (value.unresolved.length > 0) {
          lines.push(`Unresolved: ${value.unresolved.join(", ")}`);
        }
        if (value.missingCochanges.length > 0) {
          lines.push("", "Usually changed too, but missing:");
          lines.push(...value.missingCochanges.map(formatPartner));
        }
        if (value.includedPartners.length > 0) {
          lines.push("", "Included partners:");
          lines.push(...value.includedPartners.map(formatPartner));
        }
        return { text: lines.join("\n"), data: { ...value } };
      });
    }
  );
};
