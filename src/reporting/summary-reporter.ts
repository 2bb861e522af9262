/**
 * Terminal summary table renderer.
 *
 * Produces a formatted, colorized terminal summary of a coverage roll-up
 * using box-drawing characters and chalk colors. Printed by the `coverage`
 * and `run` commands.
 */

import chalk from 'chalk';

import type { CoverageRow, PairCoverageRow } from '../types/coverage.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface SummaryData {
  title: string;
  processingTimeMs?: number;
  rows: CoverageRow[];
  overall: CoverageRow;
  gapCount: number;
  pairCoverage?: PairCoverageRow;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 64;

/** Width of the tactic name column. */
const TACTIC_WIDTH = 22;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format the summary data into a colorized terminal table string.
 *
 * Verified percentages are green at 60% and above, yellow from 30%, red
 * below that.
 */
export function formatSummaryTable(data: SummaryData): string {
  const lines: string[] = [];
  const separator = chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine(data.title, true));
  if (data.processingTimeMs !== undefined) {
    lines.push(formatCenteredLine(`Processing Time: ${formatDuration(data.processingTimeMs)}`));
  }
  lines.push(separator);

  lines.push(formatSectionHeader('PER TACTIC'));
  lines.push(formatLine(`  ${'Tactic'.padEnd(TACTIC_WIDTH)} Total  Verified  Seeded  Gaps`));
  for (const row of data.rows) {
    lines.push(formatLineRaw(formatRow(row)));
  }

  lines.push(separator);
  lines.push(formatSectionHeader('OVERALL'));
  lines.push(formatLineRaw(formatRow(data.overall)));

  const pct = data.overall.totalTechniques > 0
    ? (data.overall.verifiedCount / data.overall.totalTechniques) * 100
    : 0;
  lines.push(
    formatLineRaw(
      `  Verified coverage: ${colorizeByRate(`${pct.toFixed(1)}%`, pct)}  │  Gap techniques: ${data.gapCount}`,
    ),
  );
  if (data.pairCoverage) {
    const pairs = data.pairCoverage;
    const mapped = pairs.verifiedCells + pairs.seededCells;
    lines.push(
      formatLineRaw(
        `  Pair coverage: ${colorizeByRate(`${pairs.pairCoveragePercentage.toFixed(1)}%`, pairs.pairCoveragePercentage)}` +
          `  (${pairs.verifiedCells} of ${mapped} mapped cells verified)`,
      ),
    );
  }

  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));

  return lines.join('\n');
}

/**
 * Print the formatted summary table to stdout.
 */
export function printSummary(data: SummaryData): void {
  console.log(formatSummaryTable(data));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatRow(row: CoverageRow): string {
  const pct = row.totalTechniques > 0 ? (row.verifiedCount / row.totalTechniques) * 100 : 0;
  const name = row.tactic.length > TACTIC_WIDTH ? `${row.tactic.slice(0, TACTIC_WIDTH - 1)}…` : row.tactic;
  const verified = colorizeByRate(String(row.verifiedCount).padStart(8), pct);
  return (
    `  ${name.padEnd(TACTIC_WIDTH)} ${String(row.totalTechniques).padStart(5)}  ${verified}` +
    `  ${String(row.seededOnlyCount).padStart(6)}  ${String(row.gapCount).padStart(4)}`
  );
}

/**
 * Format a line of text padded within the box borders.
 * Text is left-aligned with padding to fill the box width.
 */
function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments.
 *
 * Since chalk adds invisible ANSI escape codes, we cannot rely on
 * `.length` for padding. Instead, we compute padding from the
 * "visible" (strip-ANSI) length.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

/**
 * Format a centered line within the box.
 */
function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = Math.max(0, BOX_WIDTH - 2 - text.length);
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

/**
 * Format a section header line (cyan, bold).
 */
function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

/**
 * Colorize a value string based on a percentage rate.
 * Green >= 60%, Yellow 30-59%, Red < 30%.
 */
function colorizeByRate(text: string, rate: number): string {
  if (rate >= 60) return chalk.green(text);
  if (rate >= 30) return chalk.yellow(text);
  return chalk.red(text);
}

/**
 * Format a processing duration from milliseconds to a human-readable string.
 */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Strip ANSI escape codes from a string to get its visible length.
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
