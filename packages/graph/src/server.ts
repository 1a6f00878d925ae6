#!/usr/bin/env node
/**
 * MCP server for structural graph analysis over a relationship index.
 */

import { runServer } from "@codepulse/core";
import {
  openRelationshipStore,
  resolveStoreConfig,
  type SQLiteRelationshipStore,
} from "@codepulse/store";
import { GraphService } from "./infrastructure/GraphService.js";
import { registerAllTools, type Services } from "./tools/index.js";

interface GraphServerServices extends Services {
  store: SQLiteRelationshipStore;
}

runServer<GraphServerServices>({
  config: {
    name: "codepulse:graph",
    version: "0.1.0",
  },
  createServices: () => {
    const { dbPath, batchSize } = resolveStoreConfig();
    const store = openRelationshipStore(dbPath, { batchSize });
    const counts = store.counts();
    console.error(
      `[graph] Opened ${dbPath}: ${counts.symbols} symbols, ${counts.edges} edges in ${counts.files} files`
    );
    return { store, graph: new GraphService(store) };
  },
  registerTools: registerAllTools,
  onShutdown: ({ store }) => {
    store.close();
  },
});
