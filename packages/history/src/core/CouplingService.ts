/**
 * CouplingService - temporal coupling analyses over a relationship store.
 */

import type { RelationshipStore } from "@codepulse/store";

import { againstChangeSet, type AgainstOptions } from "./against.js";
import { recurringChangeSets, type ChangeSetOptions } from "./changeSets.js";
import { temporalCouplingPairs, type PairOptions } from "./coupling.js";
import type { AgainstReport, ChangeSet, PairReport } from "./model.js";

export class CouplingService {
  constructor(private readonly store: RelationshipStore) {}

  pairs(options: PairOptions = {}): PairReport {
    return temporalCouplingPairs(this.store, options);
  }

  sets(options: ChangeSetOptions = {}): ChangeSet[] {
    return recurringChangeSets(this.store, options);
  }

  against(paths: readonly string[], options: AgainstOptions = {}): AgainstReport {
    return againstChangeSet(this.store, paths, options);
  }
}
