/**
 * @codepulse/history
 *
 * Temporal coupling and change-set mining over co-change history.
 */

// Core exports
export * from "./core/index.js";

// Tool exports
export { registerAllTools, type Services } from "./tools/index.js";
