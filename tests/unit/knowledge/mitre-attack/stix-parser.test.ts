/**
 * Unit tests for the STIX bundle flattener.
 *
 * Tests: buildTechniqueMaster
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { buildTechniqueMaster } from '@/knowledge/mitre-attack/stix-parser.js';
import { TaxonomyFormatError } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

const FIXTURE_BUNDLE = fileURLToPath(
  new URL('../../../fixtures/attack/mini-enterprise-attack.json', import.meta.url),
);

const NOW = (): Date => new Date('2024-05-01T00:00:00.000Z');

function loadFixture(): unknown {
  return JSON.parse(readFileSync(FIXTURE_BUNDLE, 'utf-8'));
}

function tactic(stixId: string, attackId: string, shortName: string, name: string): Record<string, unknown> {
  return {
    type: 'x-mitre-tactic',
    id: stixId,
    name,
    x_mitre_shortname: shortName,
    external_references: [{ source_name: 'mitre-attack', external_id: attackId }],
  };
}

function technique(
  stixId: string,
  attackId: string,
  phases: string[],
  extra: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    type: 'attack-pattern',
    id: stixId,
    name: `Technique ${attackId}`,
    kill_chain_phases: phases.map((phase_name) => ({ kill_chain_name: 'mitre-attack', phase_name })),
    external_references: [{ source_name: 'mitre-attack', external_id: attackId }],
    ...extra,
  };
}

function bundle(objects: Array<Record<string, unknown>>): unknown {
  return { type: 'bundle', id: 'bundle--test', objects };
}

function catchError<E extends Error>(kind: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof kind) return err;
    throw err;
  }
  throw new Error(`expected ${kind.name} to be thrown`);
}

const EXEC = tactic('x-mitre-tactic--exec', 'TA0002', 'execution', 'Execution');
const PERSIST = tactic('x-mitre-tactic--persist', 'TA0003', 'persistence', 'Persistence');
const EXFIL = tactic('x-mitre-tactic--exfil', 'TA0010', 'exfiltration', 'Exfiltration');

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('buildTechniqueMaster', () => {
  it('flattens the fixture bundle', () => {
    const master = buildTechniqueMaster(loadFixture(), { now: NOW });

    expect(master.tactics).toEqual([
      { id: 'TA0002', shortName: 'execution', name: 'Execution', order: 0 },
      { id: 'TA0003', shortName: 'persistence', name: 'Persistence', order: 1 },
      { id: 'TA0010', shortName: 'exfiltration', name: 'Exfiltration', order: 2 },
    ]);
    expect(master.techniques).toEqual([
      {
        id: 'T1041',
        name: 'Exfiltration Over C2 Channel',
        tactic: 'exfiltration',
        tactics: ['exfiltration'],
        isSubtechnique: false,
        platforms: ['Linux', 'Windows', 'macOS'],
      },
      {
        id: 'T1059',
        name: 'Command and Scripting Interpreter',
        tactic: 'execution',
        tactics: ['execution'],
        isSubtechnique: false,
        platforms: ['Linux', 'Windows', 'macOS'],
      },
      {
        id: 'T1059.001',
        name: 'PowerShell',
        tactic: 'execution',
        tactics: ['execution'],
        isSubtechnique: true,
        parentId: 'T1059',
        platforms: ['Windows'],
      },
    ]);
    expect(master.metadata).toEqual({
      attackVersion: '15.1',
      objectCount: 12,
      techniqueCount: 2,
      subtechniqueCount: 1,
      tacticCount: 3,
      generatedAt: '2024-05-01T00:00:00.000Z',
    });
  });

  it('skips revoked and deprecated techniques', () => {
    const ids = buildTechniqueMaster(loadFixture(), { now: NOW }).techniques.map((t) => t.id);
    expect(ids).not.toContain('T1086');
    expect(ids).not.toContain('T1156');
  });

  it('uses the earliest tactic in canonical order as the primary tactic', () => {
    const master = buildTechniqueMaster(
      bundle([
        { type: 'x-mitre-matrix', id: 'x-mitre-matrix--m', tactic_refs: [EXEC.id, PERSIST.id, EXFIL.id] },
        EXEC,
        PERSIST,
        EXFIL,
        technique('attack-pattern--a', 'T1053', ['persistence', 'execution']),
      ]),
      { now: NOW },
    );

    expect(master.techniques[0].tactic).toBe('execution');
    expect(master.techniques[0].tactics).toEqual(['execution', 'persistence']);
  });

  it('falls back to the default Enterprise order without a matrix', () => {
    const custom = tactic('x-mitre-tactic--custom', 'TA9999', 'custom-tactic', 'Custom');
    const master = buildTechniqueMaster(bundle([custom, EXFIL, EXEC]), { now: NOW });

    expect(master.tactics.map((t) => [t.shortName, t.order])).toEqual([
      ['execution', 0],
      ['exfiltration', 1],
      ['custom-tactic', 2],
    ]);
  });

  it('lets a sub-technique inherit its parent tactics by id when no relationship exists', () => {
    const master = buildTechniqueMaster(
      bundle([
        EXEC,
        technique('attack-pattern--parent', 'T1059', ['execution']),
        technique('attack-pattern--child', 'T1059.003', [], { x_mitre_is_subtechnique: true }),
      ]),
      { now: NOW },
    );

    expect(master.techniques.map((t) => [t.id, t.tactic, t.parentId])).toEqual([
      ['T1059', 'execution', undefined],
      ['T1059.003', 'execution', 'T1059'],
    ]);
  });

  it('falls back to the bundle spec_version, then unknown, for the ATT&CK version', () => {
    const withSpec = { type: 'bundle', id: 'bundle--x', spec_version: '2.1', objects: [EXEC] };
    expect(buildTechniqueMaster(withSpec, { now: NOW }).metadata.attackVersion).toBe('2.1');
    expect(buildTechniqueMaster(bundle([EXEC]), { now: NOW }).metadata.attackVersion).toBe('unknown');
  });

  it('rejects input that is not a STIX bundle', () => {
    const err = catchError(TaxonomyFormatError, () => buildTechniqueMaster({ objects: 'nope' }));
    expect(err.message).toBe('ATT&CK dataset is not a STIX bundle with an objects array');
    expect(err.issues).toHaveLength(1);
  });

  it('collects every unresolvable technique in one error', () => {
    const err = catchError(TaxonomyFormatError, () =>
      buildTechniqueMaster(
        bundle([
          EXEC,
          technique('attack-pattern--a', 'T1021', ['lateral-movement']),
          technique('attack-pattern--b', 'T1000', []),
          technique('attack-pattern--c', 'T1059', ['execution']),
          technique('attack-pattern--d', 'T1059', ['execution']),
        ]),
      ),
    );

    expect(err.message).toBe('ATT&CK dataset could not be flattened (3 issue(s))');
    expect(err.issues).toEqual([
      'technique T1059 is declared by more than one active attack-pattern',
      'technique T1021 names undeclared tactic(s): lateral-movement',
      'technique T1000 has no resolvable tactic',
    ]);
  });
});
