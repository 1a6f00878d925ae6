/**
 * Store configuration, read from the environment.
 */

import path from "node:path";
import { z } from "zod";

import { DEFAULT_BATCH_SIZE } from "./core/batch.js";

export interface StoreConfig {
  dbPath: string;
  batchSize: number;
}

const EnvSchema = z.object({
  CODEPULSE_DB: z.string().min(1).optional(),
  CODEPULSE_BATCH_SIZE: z.coerce.number().int().min(1).max(999).optional(),
});

/**
 * Resolve the index location and batch size.
 * Defaults: `<cwd>/.codepulse/index.db`, 500 ids per IN clause.
 */
export function resolveStoreConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): StoreConfig {
  const parsed = EnvSchema.parse(env);

  return {
    dbPath: parsed.CODEPULSE_DB
      ? path.resolve(cwd, parsed.CODEPULSE_DB)
      : path.join(cwd, ".codepulse", "index.db"),
    batchSize: parsed.CODEPULSE_BATCH_SIZE ?? DEFAULT_BATCH_SIZE,
  };
}
