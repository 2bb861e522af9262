/**
 * Loads the flattened technique master and tactic order from disk and
 * exposes lookups used by the seeder and the coverage aggregator.
 */

import type { Tactic, Technique } from '../../types/mitre-attack.js';
import { TaxonomyFormatError } from '../../utils/errors.js';
import { readTactics, readTechniques } from './technique-master.js';

export interface TechniqueCatalogPaths {
  techniqueMaster: string;
  tacticOrder: string;
}

// ---------------------------------------------------------------------------
// TechniqueCatalog
// ---------------------------------------------------------------------------

export class TechniqueCatalog {
  public readonly techniques: readonly Technique[];
  /** Tactics in canonical (matrix) order. */
  public readonly tactics: readonly Tactic[];

  private readonly techniqueById: Map<string, Technique>;
  private readonly tacticByShortName: Map<string, Tactic>;

  private constructor(techniques: Technique[], tactics: Tactic[]) {
    this.techniques = techniques;
    this.tactics = [...tactics].sort((a, b) => a.order - b.order);
    this.techniqueById = new Map(techniques.map((t) => [t.id, t]));
    this.tacticByShortName = new Map(tactics.map((t) => [t.shortName, t]));
  }

  /**
   * Load the catalog from the master CSV and tactic-order CSV.
   *
   * @throws TaxonomyFormatError when either file is malformed or a
   *         technique names a tactic missing from the tactic order.
   */
  static load(paths: TechniqueCatalogPaths): TechniqueCatalog {
    return TechniqueCatalog.fromData(readTechniques(paths.techniqueMaster), readTactics(paths.tacticOrder));
  }

  /**
   * Create a catalog from in-memory data (useful for tests).
   */
  static fromData(techniques: Technique[], tactics: Tactic[]): TechniqueCatalog {
    const known = new Set(tactics.map((t) => t.shortName));
    const issues = techniques
      .filter((t) => !known.has(t.tactic))
      .map((t) => `technique ${t.id} names unknown tactic '${t.tactic}'`);

    const seen = new Set<string>();
    for (const t of techniques) {
      if (seen.has(t.id)) issues.push(`technique ${t.id} appears more than once`);
      seen.add(t.id);
    }

    if (issues.length > 0) {
      throw new TaxonomyFormatError('Technique master is inconsistent with the tactic order', issues);
    }
    return new TechniqueCatalog(techniques, tactics);
  }

  // -----------------------------------------------------------------------
  // Lookups
  // -----------------------------------------------------------------------

  getTechnique(id: string): Technique | undefined {
    return this.techniqueById.get(id);
  }

  hasTechnique(id: string): boolean {
    return this.techniqueById.has(id);
  }

  getTactic(shortName: string): Tactic | undefined {
    return this.tacticByShortName.get(shortName);
  }

  /** Display name for a tactic short name, falling back to the short name. */
  tacticName(shortName: string): string {
    return this.tacticByShortName.get(shortName)?.name ?? shortName;
  }
}
