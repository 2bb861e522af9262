/**
 * Reading and writing the technique master artifacts:
 * attack_techniques_master.csv, mitre_tactic_order.csv and
 * attack_metadata.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { Tactic, Technique, TechniqueMaster } from '../../types/mitre-attack.js';
import { formatCsv, readCsvFile } from '../../utils/csv.js';
import { TaxonomyFormatError } from '../../utils/errors.js';
import { writeFileAtomic } from '../../utils/fs.js';
import { buildTechniqueMaster, type BuildTechniqueMasterOptions } from './stix-parser.js';
import { TECHNIQUE_ID_RE } from './technique-id.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const TECHNIQUE_MASTER_COLUMNS = [
  'technique_id',
  'technique_name',
  'tactic',
  'tactics',
  'is_subtechnique',
  'parent_technique_id',
  'platforms',
] as const;

export const TACTIC_ORDER_COLUMNS = [
  'tactic_id',
  'tactic_shortname',
  'tactic_name',
  'order',
] as const;

/** Separator for multi-valued cells. */
const LIST_SEPARATOR = ';';

const splitList = (value: string): string[] =>
  value.split(LIST_SEPARATOR).map((v) => v.trim()).filter(Boolean);

// ---------------------------------------------------------------------------
// Row schemas
// ---------------------------------------------------------------------------

const TechniqueRowSchema = z.object({
  technique_id: z.string().regex(TECHNIQUE_ID_RE, 'technique_id is not an ATT&CK technique id'),
  technique_name: z.string(),
  tactic: z.string().min(1, 'tactic is empty'),
  tactics: z.string().optional().transform((v) => v ?? ''),
  is_subtechnique: z.string().optional().transform((v) => v === 'true'),
  parent_technique_id: z.string().optional().transform((v) => v ?? ''),
  platforms: z.string().optional().transform((v) => v ?? ''),
});

const TacticRowSchema = z.object({
  tactic_id: z.string().min(1),
  tactic_shortname: z.string().min(1),
  tactic_name: z.string(),
  order: z.coerce.number().int().nonnegative(),
});

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function formatTechniqueMasterCsv(techniques: readonly Technique[]): string {
  return formatCsv(
    TECHNIQUE_MASTER_COLUMNS,
    techniques.map((t) => ({
      technique_id: t.id,
      technique_name: t.name,
      tactic: t.tactic,
      tactics: t.tactics.join(LIST_SEPARATOR),
      is_subtechnique: t.isSubtechnique ? 'true' : 'false',
      parent_technique_id: t.parentId ?? '',
      platforms: t.platforms.join(LIST_SEPARATOR),
    })),
  );
}

export function formatTacticOrderCsv(tactics: readonly Tactic[]): string {
  return formatCsv(
    TACTIC_ORDER_COLUMNS,
    tactics.map((t) => ({
      tactic_id: t.id,
      tactic_shortname: t.shortName,
      tactic_name: t.name,
      order: String(t.order),
    })),
  );
}

export interface TechniqueMasterPaths {
  techniqueMaster: string;
  tacticOrder: string;
  attackMetadata: string;
}

export function writeTechniqueMaster(master: TechniqueMaster, paths: TechniqueMasterPaths): void {
  writeFileAtomic(paths.techniqueMaster, formatTechniqueMasterCsv(master.techniques));
  writeFileAtomic(paths.tacticOrder, formatTacticOrderCsv(master.tactics));
  writeFileAtomic(paths.attackMetadata, `${JSON.stringify(master.metadata, null, 2)}\n`);
}

/**
 * Read the STIX bundle at `bundlePath`, flatten it, and write all three
 * master artifacts. Nothing is written when flattening fails.
 */
export function buildTechniqueMasterFromFile(
  bundlePath: string,
  paths: TechniqueMasterPaths,
  options: BuildTechniqueMasterOptions = {},
): TechniqueMaster {
  let bundle: unknown;
  try {
    bundle = JSON.parse(readFileSync(bundlePath, 'utf-8'));
  } catch (err) {
    throw new TaxonomyFormatError(
      `Failed reading ATT&CK dataset ${bundlePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const master = buildTechniqueMaster(bundle, options);
  writeTechniqueMaster(master, paths);
  return master;
}

// ---------------------------------------------------------------------------
// Deserialization
// ---------------------------------------------------------------------------

export function readTechniques(path: string): Technique[] {
  const table = readCsvFile(path);
  const issues: string[] = [];
  const techniques: Technique[] = [];

  for (const record of table.records) {
    const parsed = TechniqueRowSchema.safeParse(record.values);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((i) => `line ${record.line}: ${i.path.join('.')}: ${i.message}`));
      continue;
    }
    const row = parsed.data;
    const tactics = splitList(row.tactics);
    techniques.push({
      id: row.technique_id,
      name: row.technique_name,
      tactic: row.tactic,
      tactics: tactics.length > 0 ? tactics : [row.tactic],
      isSubtechnique: row.is_subtechnique,
      ...(row.parent_technique_id ? { parentId: row.parent_technique_id } : {}),
      platforms: splitList(row.platforms),
    });
  }

  if (issues.length > 0) {
    throw new TaxonomyFormatError(`Technique master ${path} is malformed`, issues);
  }
  return techniques;
}

export function readTactics(path: string): Tactic[] {
  const table = readCsvFile(path);
  const issues: string[] = [];
  const tactics: Tactic[] = [];

  for (const record of table.records) {
    const parsed = TacticRowSchema.safeParse(record.values);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((i) => `line ${record.line}: ${i.path.join('.')}: ${i.message}`));
      continue;
    }
    tactics.push({
      id: parsed.data.tactic_id,
      shortName: parsed.data.tactic_shortname,
      name: parsed.data.tactic_name,
      order: parsed.data.order,
    });
  }

  if (issues.length > 0) {
    throw new TaxonomyFormatError(`Tactic order ${path} is malformed`, issues);
  }
  return tactics.sort((a, b) => a.order - b.order);
}
