/**
 * Core domain types for the history package.
 */

/**
 * Two files that changed together, with their normalized coupling.
 */
export interface CouplingPair {
  fileA: string;
  fileB: string;
  cochangeCount: number;
  /** Co-changes over the average commit count of both files, two decimals */
  strength: number;
  /** An import edge with at least two symbols joins the files */
  hasStructuralEdge: boolean;
}

export interface PairReport {
  pairs: CouplingPair[];
  /** Pairs that co-change without any structural edge */
  hiddenCouplingCount: number;
}

/**
 * A file set that was committed together more than once.
 */
export interface ChangeSet {
  /** Paths in ascending file id order */
  files: string[];
  size: number;
  occurrences: number;
  /** Share of file pairs in the set joined by a structural edge, one decimal */
  structuralCouplingPct: number;
}

/**
 * A historical co-change partner of one or more changed files.
 */
export interface CouplingPartner {
  path: string;
  cochangeCount: number;
  /** Two decimals */
  strength: number;
  /** Changed files whose history points at this partner */
  via: string[];
}

export interface AgainstReport {
  /** Store paths the changed files resolved to */
  resolved: string[];
  /** Input paths with no exact or suffix match */
  unresolved: string[];
  /** Partners that are part of the change */
  includedPartners: CouplingPartner[];
  /** Partners that usually change too but are not part of the change */
  missingCochanges: CouplingPartner[];
}
