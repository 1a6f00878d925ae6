/**
 * InsightService - dead exports and health over a relationship store.
 *
 * Everything is computed fresh from the store on each call.
 */

import { describeCycles } from "@codepulse/graph";
import type { GraphMetricsRecord, RelationshipStore } from "@codepulse/store";

import { groupDeadExports } from "./deadGroups.js";
import { fanReport, type FanQuery } from "./fan.js";
import { analyzeStructure, collectHealthMetrics, isBottleneck, isGodComponent } from "./health.js";
import { resolveDeadExports, type LivenessOptions } from "./liveness.js";
import type {
  Bottleneck,
  DeadExportGroup,
  DeadExportReport,
  DeadGroupBy,
  FanReport,
  GodComponent,
  HealthReport,
  HealthViolation,
} from "./model.js";

export interface DeadExportQuery extends LivenessOptions {
  /** Group high-confidence results */
  groupBy?: DeadGroupBy;
}

export interface DeadExportAnalysis extends DeadExportReport {
  groups: DeadExportGroup[] | null;
}

export class InsightService {
  constructor(private readonly store: RelationshipStore) {}

  deadExports(query: DeadExportQuery = {}): DeadExportAnalysis {
    const report = resolveDeadExports(this.store, query);
    return {
      ...report,
      groups: query.groupBy ? groupDeadExports(report.high, query.groupBy) : null,
    };
  }

  fan(query: FanQuery = {}): FanReport {
    return fanReport(this.store, query);
  }

  health(): HealthReport {
    const structure = analyzeStructure(this.store);
    const metrics = collectHealthMetrics(this.store, structure);
    const { graph } = structure;
    const nodeOf = (id: number) => graph.getNode(id);

    const layerViolations: HealthViolation[] | null =
      structure.violations?.map((v) => ({
        source: nodeOf(v.source)?.name ?? "?",
        sourceLayer: v.sourceLayer,
        target: nodeOf(v.target)?.name ?? "?",
        targetLayer: v.targetLayer,
      })) ?? null;

    const ranked = this.store.listGraphMetrics();
    const symbols = new Map(
      this.store.getSymbolsByIds(ranked.map((m) => m.symbolId)).map((s) => [s.id, s])
    );
    const describe = (m: GraphMetricsRecord) => {
      const symbol = symbols.get(m.symbolId);
      return {
        name: symbol?.name ?? "?",
        kind: symbol?.kind ?? "?",
        file: symbol?.filePath ?? "",
      };
    };

    const godComponents: GodComponent[] = ranked
      .filter(isGodComponent)
      .map((m) => ({ ...describe(m), degree: m.inDegree + m.outDegree }))
      .sort((a, b) => b.degree - a.degree || compareText(a.name, b.name));

    const bottlenecks: Bottleneck[] = ranked
      .filter(isBottleneck)
      .sort((a, b) => b.betweenness - a.betweenness || a.symbolId - b.symbolId)
      .map((m) => ({ ...describe(m), betweenness: Math.round(m.betweenness * 10) / 10 }));

    return {
      metrics,
      cycles: describeCycles(graph, structure.cycles).map((c) => ({
        size: c.size,
        symbols: c.symbols.map((s) => s.name),
        files: c.files,
      })),
      godComponents,
      bottlenecks,
      layerViolations,
    };
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
