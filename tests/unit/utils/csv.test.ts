/**
 * Unit tests for the CSV codec.
 *
 * Tests: parseCsv, escapeCsvField, formatCsv
 */

import { describe, it, expect } from 'vitest';
import { escapeCsvField, formatCsv, parseCsv } from '@/utils/csv.js';

// ---------------------------------------------------------------------------
// parseCsv
// ---------------------------------------------------------------------------

describe('parseCsv', () => {
  it('returns an empty table for empty input', () => {
    expect(parseCsv('')).toEqual({ header: [], records: [] });
  });

  it('reads quoted fields with commas and embedded newlines', () => {
    const table = parseCsv('a,b\n1,"x, y"\n\n"multi\nline",3\n');

    expect(table.header).toEqual(['a', 'b']);
    expect(table.records).toEqual([
      { line: 2, values: { a: '1', b: 'x, y' } },
      { line: 4, values: { a: 'multi\nline', b: '3' } },
    ]);
  });

  it('strips a UTF-8 BOM and handles CRLF with doubled quotes', () => {
    const table = parseCsv('\uFEFFid,name\r\nT1,"say ""hi"""\r\n');

    expect(table.header).toEqual(['id', 'name']);
    expect(table.records).toEqual([{ line: 2, values: { id: 'T1', name: 'say "hi"' } }]);
  });

  it('fills missing trailing fields with empty strings', () => {
    const table = parseCsv('a,b,c\n1\n');
    expect(table.records[0].values).toEqual({ a: '1', b: '', c: '' });
  });

  it('trims header names and values', () => {
    const table = parseCsv(' a , b \n 1 , 2 \n');
    expect(table.header).toEqual(['a', 'b']);
    expect(table.records[0].values).toEqual({ a: '1', b: '2' });
  });

  it('keeps whitespace inside quotes and ignores padding around them', () => {
    const table = parseCsv('a,b,c\n" lead","tail ", "x" \n');
    expect(table.records[0].values).toEqual({ a: ' lead', b: 'tail ', c: 'x' });
  });

  it('reads a last record without a trailing newline', () => {
    const table = parseCsv('a\n1\n2');
    expect(table.records.map((r) => [r.line, r.values.a])).toEqual([
      [2, '1'],
      [3, '2'],
    ]);
  });
});

// ---------------------------------------------------------------------------
// escapeCsvField / formatCsv
// ---------------------------------------------------------------------------

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('windows-security')).toBe('windows-security');
  });

  it('quotes commas, quotes, newlines and surrounding whitespace', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('x\ny')).toBe('"x\ny"');
    expect(escapeCsvField(' pad')).toBe('" pad"');
  });
});

describe('formatCsv', () => {
  it('writes LF rows with a trailing newline and blanks for absent columns', () => {
    expect(formatCsv(['a', 'b'], [{ a: '1' }, { a: 'x,y', b: '2' }])).toBe('a,b\n1,\n"x,y",2\n');
  });

  it('writes only the header when there are no rows', () => {
    expect(formatCsv(['technique_id', 'family'], [])).toBe('technique_id,family\n');
  });

  it('is read back by parseCsv', () => {
    const text = formatCsv(['id', 'notes'], [{ id: 'T1059', notes: 'Egress proxy, "pending"' }]);
    expect(parseCsv(text).records[0].values).toEqual({ id: 'T1059', notes: 'Egress proxy, "pending"' });
  });

  it('reads back values with surrounding whitespace unchanged', () => {
    const text = formatCsv(['family', 'notes'], [{ family: ' lead', notes: 'tail\t' }]);
    expect(text).toBe('family,notes\n" lead","tail\t"\n');
    expect(parseCsv(text).records[0].values).toEqual({ family: ' lead', notes: 'tail\t' });
  });
});
