/**
 * Verification merger.
 *
 * Folds proof-of-telemetry records into the scaffold: each record names a
 * (technique, family) pair plus a raw and a parsed sample, and upgrades the
 * matching cell to `verified`. The merge is all-or-nothing; any bad record
 * aborts the stage before the scaffold is touched.
 */

import { z } from 'zod';

import type { FactoryPaths } from '../types/config.js';
import type { MappingCell, VerificationRecord } from '../types/mapping.js';
import { TECHNIQUE_ID_RE } from '../knowledge/mitre-attack/technique-id.js';
import { readCsvFile, type CsvTable } from '../utils/csv.js';
import type { EvidenceResolver } from '../utils/evidence.js';
import {
  EvidenceConflictError,
  MissingEvidenceError,
  UnmappedEvidenceError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { cellKey, commitScaffold, indexCells, readScaffold } from './scaffold-store.js';

const logger = createLogger('verify');

// ---------------------------------------------------------------------------
// Record parsing
// ---------------------------------------------------------------------------

export const VERIFICATION_COLUMNS = [
  'technique_id',
  'family',
  'raw_sample_ref',
  'parsed_sample_ref',
  'timestamp',
] as const;

const VerificationRowSchema = z.object({
  technique_id: z.string().regex(TECHNIQUE_ID_RE, 'technique_id is not an ATT&CK technique id'),
  family: z.string().min(1, 'family is empty'),
  raw_sample_ref: z.string(),
  parsed_sample_ref: z.string(),
  timestamp: z.string().datetime({ offset: true, message: 'timestamp is not an ISO 8601 date-time' }),
});

/**
 * Parse verification records from a CSV table.
 *
 * @throws ValidationError on missing columns or malformed rows.
 */
export function parseVerificationRecords(table: CsvTable): VerificationRecord[] {
  const missing = VERIFICATION_COLUMNS.filter((col) => !table.header.includes(col));
  if (missing.length > 0) {
    throw new ValidationError(`Verification records are missing column(s): ${missing.join(', ')}`);
  }

  const issues: string[] = [];
  const records: VerificationRecord[] = [];

  for (const record of table.records) {
    const parsed = VerificationRowSchema.safeParse(record.values);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((i) => `line ${record.line}: ${i.message}`));
      continue;
    }
    records.push({
      techniqueId: parsed.data.technique_id,
      family: parsed.data.family,
      rawSampleRef: parsed.data.raw_sample_ref,
      parsedSampleRef: parsed.data.parsed_sample_ref,
      timestamp: parsed.data.timestamp,
      line: record.line,
    });
  }

  if (issues.length > 0) {
    throw new ValidationError(`Verification records are malformed (${issues.length} issue(s))`, issues);
  }
  return records;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export interface MergeOptions {
  /** Every sample reference must satisfy this before a cell is verified. */
  evidenceResolver?: EvidenceResolver;
}

export interface MergeResult {
  cells: MappingCell[];
  upgraded: number;
  alreadyVerified: number;
}

/**
 * Apply verification records to scaffold cells. The input array is not
 * modified.
 *
 * Problems are checked in a fixed order per record: missing evidence, then
 * unmapped pair, then conflicting evidence. The first failing check across
 * all records decides the error kind; every record failing that check is
 * listed in its issues.
 */
export function mergeVerification(
  cells: readonly MappingCell[],
  records: readonly VerificationRecord[],
  options: MergeOptions = {},
): MergeResult {
  const missingEvidence: string[] = [];
  for (const record of records) {
    for (const [column, ref] of [
      ['raw_sample_ref', record.rawSampleRef],
      ['parsed_sample_ref', record.parsedSampleRef],
    ] as const) {
      if (!ref) {
        missingEvidence.push(`line ${record.line}: ${column} is empty`);
      } else if (options.evidenceResolver && !options.evidenceResolver(ref)) {
        missingEvidence.push(`line ${record.line}: ${column} '${ref}' does not resolve to existing evidence`);
      }
    }
  }
  if (missingEvidence.length > 0) {
    throw new MissingEvidenceError(
      `${missingEvidence.length} sample reference(s) are missing or unresolvable`,
      missingEvidence,
    );
  }

  const byKey = indexCells(cells.map((cell) => ({ ...cell })));

  const unmapped = records
    .filter((r) => !byKey.has(cellKey(r.techniqueId, r.family)))
    .map((r) => `line ${r.line}: (${r.techniqueId}, ${r.family}) was never seeded`);
  if (unmapped.length > 0) {
    throw new UnmappedEvidenceError(
      `${unmapped.length} verification record(s) reference unseeded technique/family pairs`,
      unmapped,
    );
  }

  const conflicts: string[] = [];
  let upgraded = 0;
  let alreadyVerified = 0;

  for (const record of records) {
    const key = cellKey(record.techniqueId, record.family);
    const cell = byKey.get(key);
    if (!cell) continue;

    if (cell.status === 'verified') {
      if (cell.rawEvidenceRef === record.rawSampleRef && cell.parsedEvidenceRef === record.parsedSampleRef) {
        alreadyVerified += 1;
      } else {
        conflicts.push(
          `line ${record.line}: (${record.techniqueId}, ${record.family}) is verified with ` +
            `raw='${cell.rawEvidenceRef}' parsed='${cell.parsedEvidenceRef}', record has ` +
            `raw='${record.rawSampleRef}' parsed='${record.parsedSampleRef}'`,
        );
      }
      continue;
    }

    byKey.set(key, {
      ...cell,
      status: 'verified',
      rawEvidenceRef: record.rawSampleRef,
      parsedEvidenceRef: record.parsedSampleRef,
      verifiedAt: record.timestamp,
    });
    upgraded += 1;
  }

  if (conflicts.length > 0) {
    throw new EvidenceConflictError(
      `${conflicts.length} verification record(s) contradict existing evidence`,
      conflicts,
    );
  }

  return { cells: [...byKey.values()], upgraded, alreadyVerified };
}

// ---------------------------------------------------------------------------
// Stage runner
// ---------------------------------------------------------------------------

export interface RunMergeResult extends MergeResult {
  records: number;
  changed: boolean;
}

/**
 * Verify stage: scaffold + verification records → scaffold.
 */
export function runVerificationMerge(
  paths: Pick<FactoryPaths, 'scaffold' | 'verificationRecords'>,
  options: MergeOptions = {},
): RunMergeResult {
  const cells = readScaffold(paths.scaffold);
  const records = parseVerificationRecords(readCsvFile(paths.verificationRecords));

  logger.info(`Merging ${records.length} verification record(s) into ${cells.length} cells`);

  const result = mergeVerification(cells, records, options);
  const { changed } = commitScaffold(paths.scaffold, result.cells);

  return { ...result, records: records.length, changed };
}
