/**
 * Unit tests for the summary reporter.
 *
 * Tests: formatSummaryTable, printSummary
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  formatSummaryTable,
  printSummary,
  type SummaryData,
} from '@/reporting/summary-reporter.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeSummaryData(overrides?: Partial<SummaryData>): SummaryData {
  return {
    title: 'TELEMETRY COVERAGE',
    processingTimeMs: 1500,
    rows: [
      { tactic: 'Execution', totalTechniques: 2, verifiedCount: 1, seededOnlyCount: 1, gapCount: 0 },
      { tactic: 'Exfiltration', totalTechniques: 2, verifiedCount: 0, seededOnlyCount: 1, gapCount: 1 },
    ],
    overall: { tactic: 'overall', totalTechniques: 4, verifiedCount: 1, seededOnlyCount: 2, gapCount: 1 },
    gapCount: 1,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Strip ANSI escape codes from a string so we can test content
 * without worrying about chalk color codes.
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[\d+(;\d+)*m/g, '');
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('formatSummaryTable', () => {
  it('frames the table with a fixed-width box', () => {
    const lines = stripAnsi(formatSummaryTable(makeSummaryData())).split('\n');

    expect(lines[0]).toBe(`╔${'═'.repeat(64)}╗`);
    expect(lines[lines.length - 1]).toBe(`╚${'═'.repeat(64)}╝`);
    for (const line of lines) {
      expect(line).toHaveLength(66);
    }
  });

  it('shows the title and processing time', () => {
    const text = stripAnsi(formatSummaryTable(makeSummaryData()));
    expect(text).toContain('TELEMETRY COVERAGE');
    expect(text).toContain('Processing Time: 1.5s');
  });

  it('omits the processing time when not given', () => {
    const text = stripAnsi(formatSummaryTable(makeSummaryData({ processingTimeMs: undefined })));
    expect(text).not.toContain('Processing Time');
  });

  it('lists each tactic row and the overall row', () => {
    const text = stripAnsi(formatSummaryTable(makeSummaryData()));

    expect(text).toMatch(/Execution\s+2\s+1\s+1\s+0/);
    expect(text).toMatch(/Exfiltration\s+2\s+0\s+1\s+1/);
    expect(text).toMatch(/overall\s+4\s+1\s+2\s+1/);
  });

  it('reports the verified percentage and gap count', () => {
    const text = stripAnsi(formatSummaryTable(makeSummaryData()));
    expect(text).toContain('Verified coverage: 25.0%  │  Gap techniques: 1');
  });

  it('adds the pair coverage line only when given', () => {
    const pairCoverage = { tactic: 'overall', verifiedCells: 1, seededCells: 4, pairCoveragePercentage: 20 };
    const lines = stripAnsi(formatSummaryTable(makeSummaryData({ pairCoverage }))).split('\n');

    expect(lines).toContain(`║ ${'  Pair coverage: 20.0%  (1 of 5 mapped cells verified)'.padEnd(62)} ║`);
    expect(stripAnsi(formatSummaryTable(makeSummaryData()))).not.toContain('Pair coverage');
  });

  it('truncates long tactic names', () => {
    const text = stripAnsi(
      formatSummaryTable(
        makeSummaryData({
          rows: [{ tactic: 'A Very Long Tactic Name Indeed', totalTechniques: 1, verifiedCount: 0, seededOnlyCount: 0, gapCount: 1 }],
        }),
      ),
    );
    expect(text).toContain('A Very Long Tactic Na…');
  });
});

describe('printSummary', () => {
  it('writes the table to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const data = makeSummaryData();

    printSummary(data);

    expect(log).toHaveBeenCalledWith(formatSummaryTable(data));
  });
});
