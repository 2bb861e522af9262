/**
 * Coverage roll-up table (coverage_matrix.csv).
 */

import type { CoverageResult } from '../types/coverage.js';
import { formatCsv } from '../utils/csv.js';

export const COVERAGE_MATRIX_COLUMNS = [
  'tactic',
  'total_techniques',
  'verified_count',
  'seeded_only_count',
  'gap_count',
] as const;

/**
 * One line per tactic in canonical order, then the overall totals line.
 */
export function formatCoverageMatrixCsv(result: CoverageResult): string {
  return formatCsv(
    COVERAGE_MATRIX_COLUMNS,
    [...result.rows, result.overall].map((row) => ({
      tactic: row.tactic,
      total_techniques: String(row.totalTechniques),
      verified_count: String(row.verifiedCount),
      seeded_only_count: String(row.seededOnlyCount),
      gap_count: String(row.gapCount),
    })),
  );
}
