import { assertPositiveInteger } from "@codepulse/core";

/** SQLite's historical host-parameter limit is 999; stay well under it. */
export const DEFAULT_BATCH_SIZE = 500;

/**
 * Split ids into consecutive chunks of at most `size`.
 * Duplicate ids are dropped, first occurrence wins.
 */
export function chunk(ids: readonly number[], size: number = DEFAULT_BATCH_SIZE): number[][] {
  assertPositiveInteger("batchSize", size);

  const unique = Array.from(new Set(ids));
  const chunks: number[][] = [];
  for (let i = 0; i < unique.length; i += size) {
    chunks.push(unique.slice(i, i + size));
  }
  return chunks;
}

/**
 * Run a lookup per chunk and concatenate every chunk's rows.
 */
export function batched<T>(
  ids: readonly number[],
  size: number,
  lookup: (batch: number[]) => T[]
): T[] {
  const rows: T[] = [];
  for (const batch of chunk(ids, size)) {
    rows.push(...lookup(batch));
  }
  return rows;
}

/**
 * "?, ?, ?" for an IN clause of the given length.
 */
export function placeholders(count: number): string {
  return new Array(count).fill("?").join(", ");
}
