/**
 * ATT&CK Navigator layer export.
 *
 * Every technique in the master appears in each layer; its score is the
 * number of families with verified telemetry for it, and its color marks
 * verified, seeded-only or gap. Besides the overall layer there is one layer
 * per family platform, built from that platform's cells only.
 */

import type { CoverageResult, TechniqueCoverageState } from '../types/coverage.js';
import type { MappingCell } from '../types/mapping.js';
import type { TechniqueCatalog } from '../knowledge/mitre-attack/loader.js';
import { classifyTechniques } from '../coverage/aggregator.js';
import { FAMILY_PLATFORMS, type FamilyPlatform } from '../mapping/platforms.js';
import { writeFileAtomic } from '../utils/fs.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface AttackNavigatorLayer {
  name: string;
  versions: { attack: string; navigator: string; layer: string };
  domain: string;
  description: string;
  techniques: Array<{
    techniqueID: string;
    tactic: string;
    color: string;
    comment: string;
    enabled: boolean;
    score: number;
  }>;
  gradient: { colors: string[]; minValue: number; maxValue: number };
}

export interface PlatformLayer {
  platform: FamilyPlatform;
  layer: AttackNavigatorLayer;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const STATE_COLORS: Record<TechniqueCoverageState, string> = {
  verified: '#31a354',
  'seeded-only': '#fdae61',
  gap: '#d73027',
};

/** ATT&CK Navigator format versions. */
const NAVIGATOR_VERSIONS = {
  navigator: '4.9.5',
  layer: '4.5',
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function buildNavigatorLayer(
  catalog: TechniqueCatalog,
  result: CoverageResult,
  attackVersion: string,
): AttackNavigatorLayer {
  const gaps = new Set(result.gaps);
  const { overall } = result;

  return assembleLayer(
    catalog,
    (id) => result.verifiedFamilies[id] ?? [],
    (id, families) => (families.length > 0 ? 'verified' : gaps.has(id) ? 'gap' : 'seeded-only'),
    {
      name: 'Telemetry Coverage - Overall',
      description:
        `Verified telemetry for ${overall.verifiedCount} of ${overall.totalTechniques} techniques ` +
        `(${overall.seededOnlyCount} seeded only, ${overall.gapCount} gaps).`,
    },
    attackVersion,
  );
}

/**
 * Build one layer per family platform present in the scaffold, in platform
 * order. Families missing from `familyPlatforms` count as `other`.
 */
export function buildPlatformLayers(
  catalog: TechniqueCatalog,
  cells: readonly MappingCell[],
  familyPlatforms: ReadonlyMap<string, FamilyPlatform>,
  attackVersion: string,
): PlatformLayer[] {
  const platformOf = (family: string): FamilyPlatform => familyPlatforms.get(family) ?? 'other';
  const present = new Set(cells.map((cell) => platformOf(cell.family)));

  return FAMILY_PLATFORMS.filter((platform) => present.has(platform)).map((platform) => {
    const { states, verifiedFamilies } = classifyTechniques(
      catalog,
      cells.filter((cell) => platformOf(cell.family) === platform),
    );

    const counts: Record<TechniqueCoverageState, number> = { verified: 0, 'seeded-only': 0, gap: 0 };
    for (const state of states.values()) counts[state] += 1;

    const layer = assembleLayer(
      catalog,
      (id) => verifiedFamilies.get(id) ?? [],
      (id) => states.get(id) ?? 'gap',
      {
        name: `Telemetry Coverage - ${platform}`,
        description:
          `Verified ${platform} telemetry for ${counts.verified} of ${catalog.techniques.length} techniques ` +
          `(${counts['seeded-only']} seeded only, ${counts.gap} gaps).`,
      },
      attackVersion,
    );
    return { platform, layer };
  });
}

function assembleLayer(
  catalog: TechniqueCatalog,
  familiesFor: (techniqueId: string) => readonly string[],
  stateFor: (techniqueId: string, families: readonly string[]) => TechniqueCoverageState,
  header: { name: string; description: string },
  attackVersion: string,
): AttackNavigatorLayer {
  const techniques: AttackNavigatorLayer['techniques'] = [];
  let maxScore = 1;

  for (const technique of catalog.techniques) {
    const families = familiesFor(technique.id);
    const state = stateFor(technique.id, families);
    maxScore = Math.max(maxScore, families.length);

    techniques.push({
      techniqueID: technique.id,
      tactic: technique.tactic,
      color: STATE_COLORS[state],
      comment:
        state === 'verified'
          ? `Verified by: ${families.join(', ')}`
          : state === 'seeded-only'
            ? 'Seeded, awaiting proof of telemetry'
            : 'No log-source family mapped',
      enabled: true,
      score: families.length,
    });
  }

  return {
    name: header.name,
    versions: { attack: attackVersion, ...NAVIGATOR_VERSIONS },
    domain: 'enterprise-attack',
    description: header.description,
    techniques,
    gradient: { colors: ['#d9e8fb', '#0a66ff'], minValue: 0, maxValue: maxScore },
  };
}

/**
 * Export an ATT&CK Navigator JSON layer as a formatted string.
 */
export function exportNavigatorLayer(layer: AttackNavigatorLayer): string {
  return `${JSON.stringify(layer, null, 2)}\n`;
}

export function writeNavigatorLayer(layer: AttackNavigatorLayer, outputPath: string): void {
  writeFileAtomic(outputPath, exportNavigatorLayer(layer));
}
