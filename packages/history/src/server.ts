#!/usr/bin/env node
/**
 * MCP server for temporal coupling over co-change history.
 */

import { runServer } from "@codepulse/core";
import {
  openRelationshipStore,
  resolveStoreConfig,
  type SQLiteRelationshipStore,
} from "@codepulse/store";
import { CouplingService } from "./core/CouplingService.js";
import { registerAllTools, type Services } from "./tools/index.js";

interface HistoryServerServices extends Services {
  store: SQLiteRelationshipStore;
}

runServer<HistoryServerServices>({
  config: {
    name: "codepulse:history",
    version: "0.1.0",
  },
  createServices: () => {
    const { dbPath, batchSize } = resolveStoreConfig();
    const store = openRelationshipStore(dbPath, { batchSize });
    console.error(`[history] Opened ${dbPath}: ${store.listCochanges().length} co-change pairs`);
    return { store, coupling: new CouplingService(store) };
  },
  registerTools: registerAllTools,
  onShutdown: ({ store }) => {
    store.close();
  },
});
