/**
 * Mapping scaffold seeder.
 *
 * Crosses every technique with every log-source family in the inventory
 * and emits one placeholder cell per pair. Re-seeding is idempotent: a pair
 * that already exists in the prior scaffold keeps its status and evidence,
 * so rebuilding never erases verification work.
 */

import { existsSync } from 'node:fs';

import type { FactoryPaths } from '../types/config.js';
import type { LogSource } from '../types/inventory.js';
import type { CellStatus, MappingCell } from '../types/mapping.js';
import type { Technique } from '../types/mitre-attack.js';
import { TechniqueCatalog } from '../knowledge/mitre-attack/loader.js';
import { validateInventoryFile } from '../inventory/validator.js';
import { formatCsv, readCsvFile } from '../utils/csv.js';
import { SeedConflictError } from '../utils/errors.js';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import { isApplicable, resolveFamilyPlatforms } from './platforms.js';
import {
  assertScaffoldCommit,
  cellKey,
  commitScaffold,
  compareCells,
  indexCells,
  readScaffoldIfExists,
  SCAFFOLD_COLUMNS,
} from './scaffold-store.js';
import { maxStatus } from './status.js';

const logger = createLogger('seed');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SeedOptions {
  /** Mark pairs whose technique cannot occur on the family's platform as unseeded. */
  platformFilter?: boolean;
  /** Drop (and report) prior cells whose technique left the master instead of failing. */
  archiveRetired?: boolean;
}

export interface SeedResult {
  cells: MappingCell[];
  families: string[];
  /** Prior cells dropped because their technique is no longer in the master. */
  retired: MappingCell[];
  added: number;
  preserved: number;
}

// ---------------------------------------------------------------------------
// Core
// ---------------------------------------------------------------------------

/**
 * Seed the technique × family matrix.
 *
 * @throws SeedConflictError when the prior scaffold names a family that is
 *         no longer inventoried, or a technique that left the master (unless
 *         `archiveRetired` is set).
 */
export function seedScaffold(
  techniques: readonly Technique[],
  sources: readonly LogSource[],
  prior: readonly MappingCell[] | null,
  options: SeedOptions = {},
): SeedResult {
  const families = [...new Set(sources.map((s) => s.family))].sort();
  const familySet = new Set(families);
  const techniqueIds = new Set(techniques.map((t) => t.id));
  const priorCells = prior ?? [];

  const staleFamilies = [...new Set(priorCells.map((c) => c.family).filter((f) => !familySet.has(f)))].sort();
  if (staleFamilies.length > 0) {
    throw new SeedConflictError(
      `Prior scaffold references ${staleFamilies.length} family(ies) no longer in the inventory`,
      staleFamilies.map((family) => {
        const count = priorCells.filter((c) => c.family === family).length;
        return `family '${family}' (${count} cell(s))`;
      }),
    );
  }

  const retired = priorCells.filter((c) => !techniqueIds.has(c.techniqueId)).sort(compareCells);
  if (retired.length > 0 && !options.archiveRetired) {
    const retiredIds = [...new Set(retired.map((c) => c.techniqueId))];
    throw new SeedConflictError(
      `Prior scaffold references ${retiredIds.length} technique(s) no longer in the ATT&CK master; ` +
        're-run with --archive-retired to archive them',
      retiredIds.map((id) => {
        const verified = retired.filter((c) => c.techniqueId === id && c.status === 'verified').length;
        return `technique ${id}${verified > 0 ? ` (${verified} verified cell(s))` : ''}`;
      }),
    );
  }

  const platforms = resolveFamilyPlatforms(sources);
  const priorByKey = indexCells(priorCells);
  const cells: MappingCell[] = [];
  let added = 0;
  let preserved = 0;

  for (const technique of techniques) {
    for (const family of families) {
      const platform = platforms.get(family) ?? 'other';
      const computed: CellStatus =
        options.platformFilter && !isApplicable(platform, technique.platforms) ? 'unseeded' : 'seeded';

      const existing = priorByKey.get(cellKey(technique.id, family));
      if (existing) {
        preserved += 1;
        cells.push({ ...existing, status: maxStatus(existing.status, computed) });
      } else {
        added += 1;
        cells.push({
          techniqueId: technique.id,
          family,
          status: computed,
          rawEvidenceRef: '',
          parsedEvidenceRef: '',
          verifiedAt: '',
        });
      }
    }
  }

  cells.sort(compareCells);
  return { cells, families, retired, added, preserved };
}

// ---------------------------------------------------------------------------
// Stage runner
// ---------------------------------------------------------------------------

const RETIRED_COLUMNS = [...SCAFFOLD_COLUMNS, 'retired_at'] as const;

/**
 * Append retired cells to the archive, keeping one row per cell.
 */
function archiveRetiredCells(path: string, retired: readonly MappingCell[], retiredAt: string): void {
  const rows = existsSync(path) ? readCsvFile(path).records.map((r) => r.values) : [];
  const archived = new Set(rows.map((r) => cellKey(r.technique_id ?? '', r.family ?? '')));

  for (const cell of retired) {
    if (archived.has(cellKey(cell.techniqueId, cell.family))) continue;
    rows.push({
      technique_id: cell.techniqueId,
      family: cell.family,
      status: cell.status,
      raw_evidence_ref: cell.rawEvidenceRef,
      parsed_evidence_ref: cell.parsedEvidenceRef,
      verified_at: cell.verifiedAt,
      retired_at: retiredAt,
    });
  }

  writeFileAtomic(path, formatCsv(RETIRED_COLUMNS, rows));
}

export interface RunSeederOptions extends SeedOptions {
  now?: () => Date;
}

export interface RunSeederResult extends SeedResult {
  changed: boolean;
}

/**
 * Seed stage: inventory + technique master + prior scaffold → scaffold.
 */
export function runSeeder(
  paths: Pick<FactoryPaths, 'inventory' | 'techniqueMaster' | 'tacticOrder' | 'scaffold' | 'retiredCells'>,
  options: RunSeederOptions = {},
): RunSeederResult {
  const { sources } = validateInventoryFile(paths.inventory);
  const catalog = TechniqueCatalog.load(paths);
  const prior = readScaffoldIfExists(paths.scaffold);

  logger.info(
    `Seeding ${catalog.techniques.length} techniques × ${new Set(sources.map((s) => s.family)).size} families` +
      (prior ? ` over a prior scaffold of ${prior.length} cells` : ''),
  );

  const result = seedScaffold(catalog.techniques, sources, prior, options);
  const retiredKeys = new Set(result.retired.map((c) => cellKey(c.techniqueId, c.family)));

  if (result.retired.length > 0) {
    // Nothing is archived when the scaffold write would be refused.
    assertScaffoldCommit(paths.scaffold, result.cells, { retired: retiredKeys });
    archiveRetiredCells(paths.retiredCells, result.retired, (options.now ?? (() => new Date()))().toISOString());
    logger.warn(`Archived ${result.retired.length} cell(s) of retired techniques to ${paths.retiredCells}`);
  }

  const { changed } = commitScaffold(paths.scaffold, result.cells, { retired: retiredKeys });

  return { ...result, changed };
}
