import { InMemoryRelationshipStore, type FileStatsRecord, type MemoryStoreSeed } from "@codepulse/store";

export function stats(fileId: number, commitCount: number): FileStatsRecord {
  return { fileId, commitCount, totalChurn: commitCount * 10, distinctAuthors: 1 };
}

/**
 * Files src/<name>.ts with ids in the order given.
 */
export function filesNamed(...names: string[]): NonNullable<MemoryStoreSeed["files"]> {
  return names.map((name, index) => ({ id: index + 1, path: `src/${name}.ts` }));
}

export function storeWith(seed: MemoryStoreSeed): InMemoryRelationshipStore {
  return new InMemoryRelationshipStore(seed);
}
