/**
 * Flattens an ATT&CK Enterprise STIX 2.1 bundle into the technique master:
 * one row per active technique with its owning tactic(s), plus the
 * matrix's canonical tactic order.
 */

import { z } from 'zod';

import type { AttackMetadata, Tactic, Technique, TechniqueMaster } from '../../types/mitre-attack.js';
import { TaxonomyFormatError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { compareTechniqueIds } from './technique-id.js';

const logger = createLogger('attack');

// ---------------------------------------------------------------------------
// STIX shapes (only the fields we read; everything else passes through)
// ---------------------------------------------------------------------------

const ExternalReferenceSchema = z
  .object({
    source_name: z.string().optional(),
    external_id: z.string().optional(),
  })
  .passthrough();

const StixObjectSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    name: z.string().optional(),
    modified: z.string().optional(),
    external_references: z.array(ExternalReferenceSchema).optional(),
    kill_chain_phases: z
      .array(z.object({ kill_chain_name: z.string(), phase_name: z.string() }))
      .optional(),
    x_mitre_platforms: z.array(z.string()).optional(),
    x_mitre_is_subtechnique: z.boolean().optional(),
    x_mitre_shortname: z.string().optional(),
    x_mitre_deprecated: z.boolean().optional(),
    x_mitre_version: z.string().optional(),
    revoked: z.boolean().optional(),
    relationship_type: z.string().optional(),
    source_ref: z.string().optional(),
    target_ref: z.string().optional(),
    tactic_refs: z.array(z.string()).optional(),
  })
  .passthrough();

const StixBundleSchema = z
  .object({
    spec_version: z.string().optional(),
    objects: z.array(StixObjectSchema),
  })
  .passthrough();

type StixObject = z.infer<typeof StixObjectSchema>;

/**
 * Enterprise execution-flow order, used when the bundle carries no
 * x-mitre-matrix object.
 */
export const DEFAULT_TACTIC_ORDER = [
  'reconnaissance',
  'resource-development',
  'initial-access',
  'execution',
  'persistence',
  'privilege-escalation',
  'defense-evasion',
  'credential-access',
  'discovery',
  'lateral-movement',
  'collection',
  'command-and-control',
  'exfiltration',
  'impact',
] as const;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function getAttackId(obj: StixObject): string | undefined {
  return obj.external_references?.find(
    (ref) => ref.source_name === 'mitre-attack',
  )?.external_id;
}

function isActive(obj: StixObject): boolean {
  return !obj.revoked && !obj.x_mitre_deprecated;
}

function compareTacticIds(a: Omit<Tactic, 'order'>, b: Omit<Tactic, 'order'>): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Order tactics by the matrix's `tactic_refs`, falling back to the default
 * Enterprise order. Tactics the ordering does not mention follow by id.
 */
function orderTactics(
  tacticsByStixId: Map<string, Omit<Tactic, 'order'>>,
  matrix: StixObject | undefined,
): Tactic[] {
  const all = [...tacticsByStixId.values()];
  const ordered: Array<Omit<Tactic, 'order'>> = [];
  const placed = new Set<string>();

  if (matrix?.tactic_refs) {
    for (const ref of matrix.tactic_refs) {
      const tactic = tacticsByStixId.get(ref);
      if (tactic && !placed.has(tactic.shortName)) {
        ordered.push(tactic);
        placed.add(tactic.shortName);
      }
    }
  } else {
    for (const shortName of DEFAULT_TACTIC_ORDER) {
      const tactic = all.find((t) => t.shortName === shortName);
      if (tactic) {
        ordered.push(tactic);
        placed.add(shortName);
      }
    }
  }

  const rest = all.filter((t) => !placed.has(t.shortName)).sort(compareTacticIds);
  return [...ordered, ...rest].map((t, order) => ({ ...t, order }));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface BuildTechniqueMasterOptions {
  /** Clock for the metadata timestamp. */
  now?: () => Date;
}

/**
 * Build the technique master from a parsed STIX bundle.
 *
 * A technique's tactics come from its `mitre-attack` kill-chain phases; a
 * sub-technique without phases inherits its parent's through the
 * `subtechnique-of` relationship. The primary tactic is the earliest one in
 * canonical order.
 *
 * @throws TaxonomyFormatError when the bundle is malformed, a technique id
 *         repeats, a phase names an undeclared tactic, or a technique has
 *         no resolvable tactic.
 */
export function buildTechniqueMaster(
  bundle: unknown,
  options: BuildTechniqueMasterOptions = {},
): TechniqueMaster {
  const parsed = StixBundleSchema.safeParse(bundle);
  if (!parsed.success) {
    throw new TaxonomyFormatError(
      'ATT&CK dataset is not a STIX bundle with an objects array',
      parsed.error.issues.slice(0, 10).map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }

  const objects = parsed.data.objects;
  const issues: string[] = [];

  // Pass 1: tactics -----------------------------------------------------------
  const tacticsByStixId = new Map<string, Omit<Tactic, 'order'>>();
  for (const obj of objects) {
    if (obj.type !== 'x-mitre-tactic' || !isActive(obj)) continue;

    const attackId = getAttackId(obj);
    const shortName = obj.x_mitre_shortname ?? obj.name?.toLowerCase().replace(/\s+/g, '-');
    if (!attackId || !shortName) {
      issues.push(`tactic ${obj.id} has no ATT&CK id or short name`);
      continue;
    }
    tacticsByStixId.set(obj.id, { id: attackId, shortName, name: obj.name ?? shortName });
  }

  const matrix = objects.find((o) => o.type === 'x-mitre-matrix' && isActive(o) && o.tactic_refs);
  const tactics = orderTactics(tacticsByStixId, matrix);
  const tacticOrder = new Map(tactics.map((t) => [t.shortName, t.order]));

  // Pass 2: techniques --------------------------------------------------------
  const patterns = new Map<string, { attackId: string; obj: StixObject }>();
  const byAttackId = new Map<string, StixObject>();
  for (const obj of objects) {
    if (obj.type !== 'attack-pattern' || !isActive(obj)) continue;

    const attackId = getAttackId(obj);
    if (!attackId || !attackId.startsWith('T')) continue;

    if (byAttackId.has(attackId)) {
      issues.push(`technique ${attackId} is declared by more than one active attack-pattern`);
      continue;
    }
    byAttackId.set(attackId, obj);
    patterns.set(obj.id, { attackId, obj });
  }

  // Pass 3: subtechnique-of relationships ------------------------------------
  const parentOf = new Map<string, string>();
  for (const obj of objects) {
    if (obj.type !== 'relationship' || obj.relationship_type !== 'subtechnique-of') continue;
    if (!isActive(obj) || !obj.source_ref || !obj.target_ref) continue;
    parentOf.set(obj.source_ref, obj.target_ref);
  }

  const phasesOf = (obj: StixObject): string[] =>
    (obj.kill_chain_phases ?? [])
      .filter((kc) => kc.kill_chain_name === 'mitre-attack')
      .map((kc) => kc.phase_name);

  const techniques: Technique[] = [];
  for (const [stixId, { attackId, obj }] of patterns) {
    const isSubtechnique = obj.x_mitre_is_subtechnique === true || attackId.includes('.');
    const parentId = isSubtechnique ? attackId.split('.')[0] : undefined;

    let phases = phasesOf(obj);
    if (phases.length === 0 && isSubtechnique) {
      const parentStixId = parentOf.get(stixId);
      const parent = parentStixId ? patterns.get(parentStixId)?.obj : parentId ? byAttackId.get(parentId) : undefined;
      if (parent) phases = phasesOf(parent);
    }

    const unknown = phases.filter((p) => !tacticOrder.has(p));
    if (unknown.length > 0) {
      issues.push(`technique ${attackId} names undeclared tactic(s): ${unknown.join(', ')}`);
      continue;
    }
    if (phases.length === 0) {
      issues.push(`technique ${attackId} has no resolvable tactic`);
      continue;
    }

    const resolved = [...new Set(phases)].sort(
      (a, b) => (tacticOrder.get(a) ?? 0) - (tacticOrder.get(b) ?? 0),
    );

    techniques.push({
      id: attackId,
      name: obj.name ?? '',
      tactic: resolved[0],
      tactics: resolved,
      isSubtechnique,
      ...(parentId ? { parentId } : {}),
      platforms: [...(obj.x_mitre_platforms ?? [])].sort(),
    });
  }

  if (issues.length > 0) {
    throw new TaxonomyFormatError(
      `ATT&CK dataset could not be flattened (${issues.length} issue(s))`,
      issues,
    );
  }

  techniques.sort((a, b) => compareTechniqueIds(a.id, b.id));

  const collection = objects.find((o) => o.type === 'x-mitre-collection');
  const metadata: AttackMetadata = {
    attackVersion: collection?.x_mitre_version ?? parsed.data.spec_version ?? 'unknown',
    objectCount: objects.length,
    techniqueCount: techniques.filter((t) => !t.isSubtechnique).length,
    subtechniqueCount: techniques.filter((t) => t.isSubtechnique).length,
    tacticCount: tactics.length,
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
  };

  logger.debug(
    `Flattened ${techniques.length} techniques across ${tactics.length} tactics (ATT&CK ${metadata.attackVersion})`,
  );

  return { techniques, tactics, metadata };
}
