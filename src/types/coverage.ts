/**
 * Coverage roll-up types.
 */

export interface CoverageRow {
  tactic: string;
  totalTechniques: number;
  verifiedCount: number;
  seededOnlyCount: number;
  gapCount: number;
}

export type TechniqueCoverageState = 'verified' | 'seeded-only' | 'gap';

/**
 * (technique × family) pair counts. Unseeded cells are not counted, so the
 * percentage is verified cells over every seeded or verified cell.
 */
export interface PairCoverageRow {
  tactic: string;
  verifiedCells: number;
  /** Cells still seeded, awaiting proof of telemetry. */
  seededCells: number;
  pairCoveragePercentage: number;
}

export interface PairCoverage {
  tactics: PairCoverageRow[];
  overall: PairCoverageRow;
}

export interface CoverageResult {
  rows: CoverageRow[];
  overall: CoverageRow;
  /** Technique ids with no seeded or verified cell, in id order. */
  gaps: string[];
  /** Verified technique ids mapped to the families that verified them. */
  verifiedFamilies: Record<string, string[]>;
  /** Verified cell count per family. */
  familyVerifiedCounts: Record<string, number>;
  /** Pair-level coverage per tactic (same tactics as `rows`) and overall. */
  pairCoverage: PairCoverage;
  /** Scaffold cells whose technique is missing from the master. */
  orphanCells: number;
}
