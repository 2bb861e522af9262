/**
 * Persistence for the technique × family mapping scaffold.
 *
 * `commitScaffold` is the only way a stage writes the scaffold. It re-reads
 * whatever is on disk at commit time and refuses any write that would move
 * a cell backwards, change a verified cell's evidence, or drop a cell that
 * was not explicitly retired. Upgrade-only is enforced here, at the write
 * boundary, not by whichever stage happens to run.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

import type { MappingCell } from '../types/mapping.js';
import { formatCsv, parseCsv } from '../utils/csv.js';
import { StatusRegressionError, ValidationError } from '../utils/errors.js';
import { writeFileAtomic } from '../utils/fs.js';
import { compareTechniqueIds } from '../knowledge/mitre-attack/technique-id.js';
import { isCellStatus, isRegression } from './status.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SCAFFOLD_COLUMNS = [
  'technique_id',
  'family',
  'status',
  'raw_evidence_ref',
  'parsed_evidence_ref',
  'verified_at',
] as const;

const ScaffoldRowSchema = z.object({
  technique_id: z.string().min(1, 'technique_id is empty'),
  family: z.string().min(1, 'family is empty'),
  status: z.string().refine(isCellStatus, (value) => ({
    message: `status '${value}' is not one of unseeded, seeded, verified`,
  })),
  raw_evidence_ref: z.string().optional().transform((v) => v ?? ''),
  parsed_evidence_ref: z.string().optional().transform((v) => v ?? ''),
  verified_at: z.string().optional().transform((v) => v ?? ''),
});

// ---------------------------------------------------------------------------
// Keys and ordering
// ---------------------------------------------------------------------------

export function cellKey(techniqueId: string, family: string): string {
  return `${techniqueId}|${family}`;
}

export function compareCells(a: MappingCell, b: MappingCell): number {
  const byTechnique = compareTechniqueIds(a.techniqueId, b.techniqueId);
  if (byTechnique !== 0) return byTechnique;
  return a.family < b.family ? -1 : a.family > b.family ? 1 : 0;
}

export function indexCells(cells: readonly MappingCell[]): Map<string, MappingCell> {
  return new Map(cells.map((cell) => [cellKey(cell.techniqueId, cell.family), cell]));
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

export function parseScaffold(text: string, source = 'scaffold'): MappingCell[] {
  const table = parseCsv(text);
  if (table.records.length === 0 && table.header.length === 0) {
    return [];
  }

  const missing = SCAFFOLD_COLUMNS.slice(0, 3).filter((col) => !table.header.includes(col));
  if (missing.length > 0) {
    throw new ValidationError(`${source} is missing required column(s): ${missing.join(', ')}`);
  }

  const issues: string[] = [];
  const cells: MappingCell[] = [];
  const seen = new Map<string, number>();

  for (const record of table.records) {
    const parsed = ScaffoldRowSchema.safeParse(record.values);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((i) => `line ${record.line}: ${i.message}`));
      continue;
    }

    const row = parsed.data;
    const key = cellKey(row.technique_id, row.family);
    const firstLine = seen.get(key);
    if (firstLine !== undefined) {
      issues.push(
        `line ${record.line}: duplicate cell (${row.technique_id}, ${row.family}) (first seen on line ${firstLine})`,
      );
      continue;
    }
    seen.set(key, record.line);

    if (row.status === 'verified' && (!row.raw_evidence_ref || !row.parsed_evidence_ref)) {
      issues.push(`line ${record.line}: verified cell (${row.technique_id}, ${row.family}) lacks evidence references`);
    }

    cells.push({
      techniqueId: row.technique_id,
      family: row.family,
      status: row.status,
      rawEvidenceRef: row.raw_evidence_ref,
      parsedEvidenceRef: row.parsed_evidence_ref,
      verifiedAt: row.verified_at,
    });
  }

  if (issues.length > 0) {
    throw new ValidationError(`${source} is malformed (${issues.length} issue(s))`, issues);
  }
  return cells;
}

export function readScaffold(path: string): MappingCell[] {
  return parseScaffold(readFileSync(path, 'utf-8'), path);
}

/** Read the scaffold, or `null` when no scaffold has been written yet. */
export function readScaffoldIfExists(path: string): MappingCell[] | null {
  return existsSync(path) ? readScaffold(path) : null;
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

export function formatScaffoldCsv(cells: readonly MappingCell[]): string {
  return formatCsv(
    SCAFFOLD_COLUMNS,
    [...cells].sort(compareCells).map((cell) => ({
      technique_id: cell.techniqueId,
      family: cell.family,
      status: cell.status,
      raw_evidence_ref: cell.rawEvidenceRef,
      parsed_evidence_ref: cell.parsedEvidenceRef,
      verified_at: cell.verifiedAt,
    })),
  );
}

/**
 * List every way `next` would violate the upgrade-only invariant relative
 * to `current`. Keys in `retired` may disappear.
 */
export function findRegressions(
  current: readonly MappingCell[],
  next: readonly MappingCell[],
  retired: ReadonlySet<string> = new Set(),
): string[] {
  const nextByKey = indexCells(next);
  const issues: string[] = [];

  for (const before of current) {
    const key = cellKey(before.techniqueId, before.family);
    const after = nextByKey.get(key);
    const label = `(${before.techniqueId}, ${before.family})`;

    if (!after) {
      if (!retired.has(key)) issues.push(`cell ${label} would be dropped`);
      continue;
    }
    if (isRegression(before.status, after.status)) {
      issues.push(`cell ${label} would regress from ${before.status} to ${after.status}`);
      continue;
    }
    if (
      before.status === 'verified' &&
      (before.rawEvidenceRef !== after.rawEvidenceRef || before.parsedEvidenceRef !== after.parsedEvidenceRef)
    ) {
      issues.push(`cell ${label} would change its verified evidence`);
    }
  }

  return issues;
}

export interface CommitOptions {
  /** Cell keys that may be removed (archived retired techniques). */
  retired?: ReadonlySet<string>;
}

export interface CommitResult {
  cells: number;
  changed: boolean;
}

/**
 * Check `cells` against the scaffold currently at `path` without writing.
 * Returns the text on disk, or `null` when there is no scaffold yet.
 *
 * @throws StatusRegressionError when the write would regress or drop a cell.
 */
export function assertScaffoldCommit(
  path: string,
  cells: readonly MappingCell[],
  options: CommitOptions = {},
): string | null {
  const existingText = existsSync(path) ? readFileSync(path, 'utf-8') : null;
  if (existingText === null) return null;

  const issues = findRegressions(parseScaffold(existingText, path), cells, options.retired);
  if (issues.length > 0) {
    throw new StatusRegressionError(`Refusing to write ${path}: ${issues.length} cell(s) would lose status`, issues);
  }
  return existingText;
}

/**
 * Write `cells` as the scaffold at `path`, enforcing upgrade-only against
 * the file currently on disk.
 *
 * @throws StatusRegressionError when the write would regress or drop a cell.
 */
export function commitScaffold(
  path: string,
  cells: readonly MappingCell[],
  options: CommitOptions = {},
): CommitResult {
  const existingText = assertScaffoldCommit(path, cells, options);
  const content = formatScaffoldCsv(cells);

  if (existingText === content) {
    return { cells: cells.length, changed: false };
  }

  writeFileAtomic(path, content);
  return { cells: cells.length, changed: true };
}
