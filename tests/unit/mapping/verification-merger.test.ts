/**
 * Unit tests for the verification merger.
 *
 * Tests: parseVerificationRecords, mergeVerification
 */

import { describe, it, expect } from 'vitest';

import { mergeVerification, parseVerificationRecords } from '@/mapping/verification-merger.js';
import type { MappingCell, VerificationRecord } from '@/types/mapping.js';
import { parseCsv } from '@/utils/csv.js';
import {
  EvidenceConflictError,
  MissingEvidenceError,
  UnmappedEvidenceError,
  ValidationError,
} from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeCell(overrides: Partial<MappingCell> = {}): MappingCell {
  return {
    techniqueId: 'T1059',
    family: 'windows-security',
    status: 'seeded',
    rawEvidenceRef: '',
    parsedEvidenceRef: '',
    verifiedAt: '',
    ...overrides,
  };
}

function makeRecord(overrides: Partial<VerificationRecord> = {}): VerificationRecord {
  return {
    techniqueId: 'T1059',
    family: 'windows-security',
    rawSampleRef: 'samples/raw/win-4688.xml',
    parsedSampleRef: 'samples/parsed/win-4688.json',
    timestamp: '2024-05-01T10:00:00Z',
    line: 2,
    ...overrides,
  };
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

const HEADER = 'technique_id,family,raw_sample_ref,parsed_sample_ref,timestamp';

// ---------------------------------------------------------------------------
// parseVerificationRecords
// ---------------------------------------------------------------------------

describe('parseVerificationRecords', () => {
  it('reads records with their line numbers', () => {
    const records = parseVerificationRecords(
      parseCsv(`${HEADER}\nT1059,windows-security,samples/raw/a.xml,samples/parsed/a.json,2024-05-01T10:00:00Z\n`),
    );
    expect(records).toEqual([
      makeRecord({ rawSampleRef: 'samples/raw/a.xml', parsedSampleRef: 'samples/parsed/a.json' }),
    ]);
  });

  it('rejects missing columns', () => {
    const err = catchError(ValidationError, () =>
      parseVerificationRecords(parseCsv('technique_id,family,raw_sample_ref,parsed_sample_ref\n')),
    );
    expect(err.message).toBe('Verification records are missing column(s): timestamp');
  });

  it('rejects bad technique ids and timestamps', () => {
    const err = catchError(ValidationError, () =>
      parseVerificationRecords(parseCsv(`${HEADER}\nX1,windows-security,a,b,2024-05-01T10:00:00Z\nT1059,proxy,a,b,yesterday\n`)),
    );
    expect(err.issues).toEqual([
      'line 2: technique_id is not an ATT&CK technique id',
      'line 3: timestamp is not an ISO 8601 date-time',
    ]);
  });

  it('accepts only full ISO 8601 date-times, with Z or an offset', () => {
    const rows = ['T1059,proxy,a,b,1', 'T1059,proxy,a,b,2024-05-01', 'T1059,proxy,a,b,May 1 2024'];
    const err = catchError(ValidationError, () => parseVerificationRecords(parseCsv(`${HEADER}\n${rows.join('\n')}\n`)));
    expect(err.issues).toEqual([
      'line 2: timestamp is not an ISO 8601 date-time',
      'line 3: timestamp is not an ISO 8601 date-time',
      'line 4: timestamp is not an ISO 8601 date-time',
    ]);

    const records = parseVerificationRecords(
      parseCsv(`${HEADER}\nT1059,proxy,a,b,2024-05-01T10:00:00+02:00\nT1041,proxy,a,b,2024-05-01T10:00:00.123Z\n`),
    );
    expect(records.map((r) => r.timestamp)).toEqual(['2024-05-01T10:00:00+02:00', '2024-05-01T10:00:00.123Z']);
  });
});

// ---------------------------------------------------------------------------
// mergeVerification
// ---------------------------------------------------------------------------

describe('mergeVerification', () => {
  it('upgrades the named cell and nothing else', () => {
    const cells = [makeCell(), makeCell({ family: 'proxy' }), makeCell({ techniqueId: 'T1041' })];

    const result = mergeVerification(cells, [makeRecord()]);

    expect(result.upgraded).toBe(1);
    expect(result.alreadyVerified).toBe(0);
    expect(result.cells).toEqual([
      makeCell({
        status: 'verified',
        rawEvidenceRef: 'samples/raw/win-4688.xml',
        parsedEvidenceRef: 'samples/parsed/win-4688.json',
        verifiedAt: '2024-05-01T10:00:00Z',
      }),
      makeCell({ family: 'proxy' }),
      makeCell({ techniqueId: 'T1041' }),
    ]);
    expect(cells[0].status).toBe('seeded');
  });

  it('upgrades unseeded cells too', () => {
    const result = mergeVerification([makeCell({ status: 'unseeded' })], [makeRecord()]);
    expect(result.cells[0].status).toBe('verified');
  });

  it('counts a repeated identical record as already verified', () => {
    const { cells } = mergeVerification([makeCell()], [makeRecord()]);
    const again = mergeVerification(cells, [makeRecord({ timestamp: '2024-06-01T00:00:00Z' })]);

    expect(again.upgraded).toBe(0);
    expect(again.alreadyVerified).toBe(1);
    expect(again.cells).toEqual(cells);
  });

  it('rejects evidence that contradicts a verified cell', () => {
    const { cells } = mergeVerification([makeCell()], [makeRecord()]);

    const err = catchError(EvidenceConflictError, () =>
      mergeVerification(cells, [makeRecord({ rawSampleRef: 'samples/raw/other.xml', line: 7 })]),
    );

    expect(err.issues).toEqual([
      "line 7: (T1059, windows-security) is verified with raw='samples/raw/win-4688.xml' " +
        "parsed='samples/parsed/win-4688.json', record has raw='samples/raw/other.xml' " +
        "parsed='samples/parsed/win-4688.json'",
    ]);
  });

  it('rejects records for pairs that were never seeded', () => {
    const err = catchError(UnmappedEvidenceError, () =>
      mergeVerification([makeCell()], [makeRecord({ family: 'dns', line: 3 })]),
    );

    expect(err.message).toBe('1 verification record(s) reference unseeded technique/family pairs');
    expect(err.issues).toEqual(['line 3: (T1059, dns) was never seeded']);
  });

  it('rejects empty or unresolvable sample references', () => {
    const err = catchError(MissingEvidenceError, () =>
      mergeVerification(
        [makeCell()],
        [makeRecord({ rawSampleRef: '' }), makeRecord({ line: 3, parsedSampleRef: 'samples/parsed/gone.json' })],
        { evidenceResolver: (ref) => !ref.includes('gone') },
      ),
    );

    expect(err.issues).toEqual([
      'line 2: raw_sample_ref is empty',
      "line 3: parsed_sample_ref 'samples/parsed/gone.json' does not resolve to existing evidence",
    ]);
  });

  it('reports missing evidence before unmapped pairs', () => {
    expect(() =>
      mergeVerification([makeCell()], [makeRecord({ family: 'dns' }), makeRecord({ line: 3, parsedSampleRef: '' })]),
    ).toThrow(MissingEvidenceError);
  });
});
