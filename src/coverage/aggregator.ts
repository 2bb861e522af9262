/**
 * Coverage aggregator.
 *
 * Rolls the (possibly partially verified) scaffold up into per-tactic and
 * overall technique counts. Each technique lands in exactly one bucket:
 * verified (some family verified it), seeded-only (at least one seeded
 * cell, none verified) or gap (nothing seeded). Techniques are counted once,
 * under their primary tactic, so each row satisfies
 * verified + seededOnly + gap = total.
 *
 * Alongside the technique counts, every seeded or verified cell is counted
 * under its technique's primary tactic for the pair-level figure.
 */

import type { CoverageResult, CoverageRow, PairCoverageRow, TechniqueCoverageState } from '../types/coverage.js';
import type { CellStatus, MappingCell } from '../types/mapping.js';
import type { TechniqueCatalog } from '../knowledge/mitre-attack/loader.js';
import { compareTechniqueIds } from '../knowledge/mitre-attack/technique-id.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('coverage');

/** Label of the totals row. */
export const OVERALL_TACTIC = 'overall';

function emptyRow(tactic: string): CoverageRow {
  return { tactic, totalTechniques: 0, verifiedCount: 0, seededOnlyCount: 0, gapCount: 0 };
}

function addState(row: CoverageRow, state: TechniqueCoverageState): void {
  row.totalTechniques += 1;
  if (state === 'verified') row.verifiedCount += 1;
  else if (state === 'seeded-only') row.seededOnlyCount += 1;
  else row.gapCount += 1;
}

function emptyPairRow(tactic: string): PairCoverageRow {
  return { tactic, verifiedCells: 0, seededCells: 0, pairCoveragePercentage: 0 };
}

function addCell(row: PairCoverageRow, status: CellStatus): void {
  if (status === 'verified') row.verifiedCells += 1;
  else if (status === 'seeded') row.seededCells += 1;
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Classify every technique in the catalog from its scaffold cells.
 */
export function classifyTechniques(
  catalog: TechniqueCatalog,
  cells: readonly MappingCell[],
): { states: Map<string, TechniqueCoverageState>; verifiedFamilies: Map<string, string[]>; orphanCells: number } {
  const hasSeeded = new Set<string>();
  const verifiedFamilies = new Map<string, string[]>();
  let orphanCells = 0;

  for (const cell of cells) {
    if (!catalog.hasTechnique(cell.techniqueId)) {
      orphanCells += 1;
      continue;
    }
    if (cell.status === 'verified') {
      const families = verifiedFamilies.get(cell.techniqueId) ?? [];
      families.push(cell.family);
      verifiedFamilies.set(cell.techniqueId, families);
    } else if (cell.status === 'seeded') {
      hasSeeded.add(cell.techniqueId);
    }
  }

  const states = new Map<string, TechniqueCoverageState>();
  for (const technique of catalog.techniques) {
    const state: TechniqueCoverageState = verifiedFamilies.has(technique.id)
      ? 'verified'
      : hasSeeded.has(technique.id)
        ? 'seeded-only'
        : 'gap';
    states.set(technique.id, state);
  }

  for (const families of verifiedFamilies.values()) {
    families.sort();
  }

  return { states, verifiedFamilies, orphanCells };
}

/**
 * Aggregate coverage per tactic, in the catalog's canonical tactic order.
 * Tactics with no techniques are omitted.
 */
export function aggregateCoverage(catalog: TechniqueCatalog, cells: readonly MappingCell[]): CoverageResult {
  const { states, verifiedFamilies, orphanCells } = classifyTechniques(catalog, cells);

  const byTactic = new Map<string, CoverageRow>();
  const overall = emptyRow(OVERALL_TACTIC);

  for (const technique of catalog.techniques) {
    const state = states.get(technique.id) ?? 'gap';
    const row = byTactic.get(technique.tactic) ?? emptyRow(catalog.tacticName(technique.tactic));
    addState(row, state);
    byTactic.set(technique.tactic, row);
    addState(overall, state);
  }

  const activeTactics = catalog.tactics.filter((tactic) => (byTactic.get(tactic.shortName)?.totalTechniques ?? 0) > 0);
  const rows = activeTactics
    .map((tactic) => byTactic.get(tactic.shortName))
    .filter((row): row is CoverageRow => row !== undefined);

  const gaps = [...states.entries()]
    .filter(([, state]) => state === 'gap')
    .map(([id]) => id)
    .sort(compareTechniqueIds);

  const familyCounts = new Map<string, number>();
  const pairsByTactic = new Map<string, PairCoverageRow>();
  const pairOverall = emptyPairRow(OVERALL_TACTIC);

  for (const cell of cells) {
    if (!familyCounts.has(cell.family)) familyCounts.set(cell.family, 0);

    const technique = catalog.getTechnique(cell.techniqueId);
    if (!technique) continue;

    if (cell.status === 'verified') {
      familyCounts.set(cell.family, (familyCounts.get(cell.family) ?? 0) + 1);
    }
    const pairRow = pairsByTactic.get(technique.tactic) ?? emptyPairRow(catalog.tacticName(technique.tactic));
    addCell(pairRow, cell.status);
    pairsByTactic.set(technique.tactic, pairRow);
    addCell(pairOverall, cell.status);
  }

  const pairTactics = activeTactics.map(
    (tactic) => pairsByTactic.get(tactic.shortName) ?? emptyPairRow(catalog.tacticName(tactic.shortName)),
  );
  for (const row of [...pairTactics, pairOverall]) {
    row.pairCoveragePercentage = percentage(row.verifiedCells, row.verifiedCells + row.seededCells);
  }

  if (orphanCells > 0) {
    logger.warn(`Skipped ${orphanCells} scaffold cell(s) naming techniques absent from the master`);
  }

  return {
    rows,
    overall,
    gaps,
    verifiedFamilies: Object.fromEntries(
      [...verifiedFamilies.entries()].sort(([a], [b]) => compareTechniqueIds(a, b)),
    ),
    familyVerifiedCounts: Object.fromEntries([...familyCounts.entries()].sort(([a], [b]) => compareStrings(a, b))),
    pairCoverage: { tactics: pairTactics, overall: pairOverall },
    orphanCells,
  };
}

/**
 * Share of techniques verified, as a percentage rounded to two decimals.
 */
export function verifiedPercentage(row: CoverageRow): number {
  return percentage(row.verifiedCount, row.totalTechniques);
}
