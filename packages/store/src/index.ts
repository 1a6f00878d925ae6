// Model
export * from "./core/model.js";

// Ports
export type { RelationshipStore } from "./core/ports/RelationshipStore.js";

// Batching
export { DEFAULT_BATCH_SIZE, chunk, batched, placeholders } from "./core/batch.js";

// Adapters
export {
  SQLiteRelationshipStore,
  openRelationshipStore,
  type SQLiteStoreOptions,
} from "./infrastructure/sqlite/SQLiteRelationshipStore.js";
export {
  InMemoryRelationshipStore,
  type MemoryStoreSeed,
  type FileSeed,
  type SymbolSeed,
  type EdgeSeed,
  type FileEdgeSeed,
  type HyperedgeSeed,
} from "./infrastructure/memory/InMemoryRelationshipStore.js";

// Config
export { resolveStoreConfig, type StoreConfig } from "./config.js";
