#!/usr/bin/env node
/**
 * MCP server for dead-export and health insight.
 */

import { runServer } from "@codepulse/core";
import {
  openRelationshipStore,
  resolveStoreConfig,
  type SQLiteRelationshipStore,
} from "@codepulse/store";
import { InsightService } from "./InsightService.js";
import { registerAllTools, type Services } from "./tools/index.js";

interface InsightServerServices extends Services {
  store: SQLiteRelationshipStore;
}

runServer<InsightServerServices>({
  config: {
    name: "codepulse:insight",
    version: "0.1.0",
  },
  createServices: () => {
    const { dbPath, batchSize } = resolveStoreConfig();
    const store = openRelationshipStore(dbPath, { batchSize });
    const counts = store.counts();
    console.error(`[insight] Opened ${dbPath}: ${counts.symbols} symbols in ${counts.files} files`);
    return { store, insight: new InsightService(store) };
  },
  registerTools: registerAllTools,
  onShutdown: ({ store }) => {
    store.close();
  },
});
