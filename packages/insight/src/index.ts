/**
 * @codepulse/insight
 *
 * Dead exports, fan-in/fan-out and codebase health from a relationship index.
 */

export * from "./model.js";
export {
  DEFAULT_LIVENESS_HOPS,
  importerIndex,
  importersWithin,
  resolveDeadExports,
  type LivenessOptions,
} from "./liveness.js";
export { groupDeadExports, parentDirectory } from "./deadGroups.js";
export {
  GOD_COMPONENT_DEGREE,
  BOTTLENECK_BETWEENNESS,
  computeHealthScore,
  collectHealthMetrics,
  analyzeStructure,
  type StructureAnalysis,
  isGodComponent,
  isBottleneck,
} from "./health.js";
export {
  DEFAULT_FAN_COUNT,
  SYMBOL_FAN_THRESHOLD,
  FILE_FAN_THRESHOLD,
  fanFlag,
  fanReport,
  type FanQuery,
} from "./fan.js";
export {
  InsightService,
  type DeadExportQuery,
  type DeadExportAnalysis,
} from "./InsightService.js";
export { registerAllTools, type Services } from "./tools/index.js";
