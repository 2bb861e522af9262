import { describe, it, expect } from 'vitest';

import { formatCoverageMatrixCsv } from '@/reporting/matrix-reporter.js';

describe('formatCoverageMatrixCsv', () => {
  it('writes one line per tactic followed by the overall line', () => {
    const csv = formatCoverageMatrixCsv({
      rows: [
        { tactic: 'Execution', totalTechniques: 2, verifiedCount: 1, seededOnlyCount: 1, gapCount: 0 },
        { tactic: 'Command and Control', totalTechniques: 1, verifiedCount: 0, seededOnlyCount: 0, gapCount: 1 },
      ],
      overall: { tactic: 'overall', totalTechniques: 3, verifiedCount: 1, seededOnlyCount: 1, gapCount: 1 },
      gaps: ['T1071'],
      verifiedFamilies: {},
      familyVerifiedCounts: {},
      pairCoverage: {
        tactics: [],
        overall: { tactic: 'overall', verifiedCells: 1, seededCells: 2, pairCoveragePercentage: 33.33 },
      },
      orphanCells: 0,
    });

    expect(csv).toBe(
      [
        'tactic,total_techniques,verified_count,seeded_only_count,gap_count',
        'Execution,2,1,1,0',
        'Command and Control,1,0,0,1',
        'overall,3,1,1,1',
        '',
      ].join('\n'),
    );
  });
});
