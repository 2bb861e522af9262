/**
 * Machine-readable JSON coverage report.
 *
 * Carries the full roll-up: per-tactic rows, the overall totals, the gap
 * list, which families verified each technique, per-family counts and the
 * pair-level coverage (verified cells over seeded or verified cells).
 */

import type { CoverageResult, CoverageRow, PairCoverage } from '../types/coverage.js';
import { writeFileAtomic } from '../utils/fs.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface CoverageReport {
  metadata: {
    generatedAt: string;
    factoryVersion: string;
    attackVersion: string;
  };
  overall: CoverageRow & { verifiedPercentage: number };
  tactics: CoverageRow[];
  gaps: string[];
  verifiedFamilies: Record<string, string[]>;
  familyVerifiedCounts: Record<string, number>;
  pairCoverage: PairCoverage;
  orphanCells: number;
}

export interface CoverageReportMetadata {
  generatedAt: string;
  factoryVersion: string;
  attackVersion: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function buildCoverageReport(
  result: CoverageResult,
  metadata: CoverageReportMetadata,
  verifiedPercentage: number,
): CoverageReport {
  return {
    metadata,
    overall: { ...result.overall, verifiedPercentage },
    tactics: result.rows,
    gaps: result.gaps,
    verifiedFamilies: result.verifiedFamilies,
    familyVerifiedCounts: result.familyVerifiedCounts,
    pairCoverage: result.pairCoverage,
    orphanCells: result.orphanCells,
  };
}

/**
 * Generate a formatted JSON string from the coverage report.
 */
export function generateJsonReport(report: CoverageReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Write the coverage report to disk, creating parent directories.
 */
export function writeCoverageReport(report: CoverageReport, outputPath: string): void {
  writeFileAtomic(outputPath, generateJsonReport(report));
}
