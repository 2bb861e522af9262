/**
 * Inventory validator.
 *
 * Checks the hand-maintained log-source inventory for structural
 * completeness before anything downstream trusts it: required columns,
 * unique source ids, and sample references on every row that claims
 * proven SIEM ingestion. All problems are collected and raised together
 * as one ValidationError so the operator can fix the file in one pass.
 */

import { z } from 'zod';

import type { InventoryValidationResult, LogSource } from '../types/inventory.js';
import { isTechniqueId } from '../knowledge/mitre-attack/technique-id.js';
import { readCsvFile, type CsvTable } from '../utils/csv.js';
import type { EvidenceResolver } from '../utils/evidence.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('inventory');

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const REQUIRED_INVENTORY_COLUMNS = [
  'source_id',
  'family',
  'sample_raw',
  'sample_parsed',
  'siem_ingestion_proven',
] as const;

const TRUE_VALUES = new Set(['true', 'yes', '1']);
const FALSE_VALUES = new Set(['false', 'no', '0']);

// ---------------------------------------------------------------------------
// Row schema
// ---------------------------------------------------------------------------

/**
 * Parse a boolean-like cell. Empty reads as `null` so callers can decide
 * what "unset" means for their column.
 */
export function parseBooleanish(value: string): boolean | null | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return null;
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

const optionalText = z.string().optional().transform((v) => v ?? '');

const InventoryRowSchema = z.object({
  source_id: z.string().min(1, 'source_id is empty'),
  family: z.string().min(1, 'family is empty'),
  sample_raw: z.string(),
  sample_parsed: z.string(),
  siem_ingestion_proven: z.string().transform((value, ctx) => {
    const parsed = parseBooleanish(value);
    if (parsed === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `siem_ingestion_proven='${value}' is not boolean-like (true/false/yes/no/1/0)`,
      });
      return z.NEVER;
    }
    return parsed ?? false;
  }),
  vendor: optionalText,
  product: optionalText,
  platform: optionalText,
  sourcetype: optionalText,
  index: optionalText,
  enabled: optionalText,
  owner_group: optionalText,
  mitre_techniques: optionalText,
  notes: optionalText,
});

type InventoryRow = z.infer<typeof InventoryRowSchema>;

function splitList(value: string): string[] {
  return value
    .split(/[,;\s]+/)
    .map((item) => item.trim())
    .filter(Boolean);
}

function toLogSource(row: InventoryRow, line: number): LogSource {
  return {
    sourceId: row.source_id,
    family: row.family,
    rawSampleRef: row.sample_raw,
    parsedSampleRef: row.sample_parsed,
    siemIngestionProven: row.siem_ingestion_proven,
    vendor: row.vendor,
    product: row.product,
    platform: row.platform.toLowerCase(),
    sourcetype: row.sourcetype,
    index: row.index,
    enabled: parseBooleanish(row.enabled) ?? null,
    owner: row.owner_group,
    mitreTechniques: splitList(row.mitre_techniques),
    notes: row.notes,
    line,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface ValidateInventoryOptions {
  /** When given, every non-empty sample reference must resolve. */
  sampleResolver?: EvidenceResolver;
}

/**
 * Validate a parsed inventory table.
 *
 * @throws ValidationError listing every problem found, each prefixed with
 *         its CSV line number.
 */
export function validateInventory(
  table: CsvTable,
  options: ValidateInventoryOptions = {},
): InventoryValidationResult {
  const missing = REQUIRED_INVENTORY_COLUMNS.filter((col) => !table.header.includes(col));
  if (missing.length > 0) {
    throw new ValidationError(
      `Inventory is missing required column(s): ${missing.join(', ')}`,
      [`expected columns: ${REQUIRED_INVENTORY_COLUMNS.join(', ')}`, `found: ${table.header.join(', ')}`],
    );
  }

  const issues: string[] = [];
  const warnings: string[] = [];
  const sources: LogSource[] = [];
  const firstSeen = new Map<string, number>();

  for (const record of table.records) {
    const { line } = record;
    const parsed = InventoryRowSchema.safeParse(record.values);

    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`line ${line}: ${issue.message}`);
      }
      continue;
    }

    const source = toLogSource(parsed.data, line);

    const previousLine = firstSeen.get(source.sourceId);
    if (previousLine !== undefined) {
      issues.push(`line ${line}: duplicate source_id '${source.sourceId}' (first seen on line ${previousLine})`);
    } else {
      firstSeen.set(source.sourceId, line);
    }

    if (source.siemIngestionProven) {
      if (!source.rawSampleRef) {
        issues.push(`line ${line}: '${source.sourceId}' is marked SIEM-ingestion-proven but sample_raw is empty`);
      }
      if (!source.parsedSampleRef) {
        issues.push(`line ${line}: '${source.sourceId}' is marked SIEM-ingestion-proven but sample_parsed is empty`);
      }
    }

    if (options.sampleResolver) {
      for (const [column, ref] of [
        ['sample_raw', source.rawSampleRef],
        ['sample_parsed', source.parsedSampleRef],
      ] as const) {
        if (ref && !options.sampleResolver(ref)) {
          issues.push(`line ${line}: ${column} '${ref}' does not resolve to a file`);
        }
      }
    }

    if (parsed.data.enabled && source.enabled === null) {
      warnings.push(`line ${line}: enabled='${parsed.data.enabled}' is not boolean-like`);
    }
    for (const techniqueId of source.mitreTechniques) {
      if (!isTechniqueId(techniqueId)) {
        warnings.push(`line ${line}: bad mitre_techniques id '${techniqueId}'`);
      }
    }

    sources.push(source);
  }

  if (issues.length > 0) {
    throw new ValidationError(`Inventory failed validation with ${issues.length} issue(s)`, issues);
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }

  const families = [...new Set(sources.map((s) => s.family))].sort();
  logger.debug(`Validated ${sources.length} source(s) across ${families.length} families`);

  return { sources, families, warnings };
}

/**
 * Read and validate the inventory CSV at `path`.
 */
export function validateInventoryFile(
  path: string,
  options: ValidateInventoryOptions = {},
): InventoryValidationResult {
  return validateInventory(readCsvFile(path), options);
}
