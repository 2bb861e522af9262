/**
 * Minimal RFC 4180 CSV reader/writer for the pipeline's tabular artifacts.
 *
 * Handles quoted fields (including embedded commas, quotes and newlines),
 * CRLF line endings and a leading UTF-8 BOM. Output always uses LF and a
 * trailing newline so regenerated files diff cleanly.
 */

import { readFileSync } from 'node:fs';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CsvRow = Record<string, string>;

export interface CsvRecord {
  /** 1-based line number where the record starts (header is line 1). */
  line: number;
  values: CsvRow;
}

export interface CsvTable {
  header: string[];
  records: CsvRecord[];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface RawRecord {
  line: number;
  fields: string[];
}

function splitRecords(text: string): RawRecord[] {
  const records: RawRecord[] = [];
  let fields: string[] = [];
  let current = '';
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endField = (): void => {
    fields.push(quoted ? current : current.trim());
    current = '';
    quoted = false;
  };

  const endRecord = (): void => {
    endField();
    // A line holding nothing at all is skipped rather than read as one empty field.
    if (!(fields.length === 1 && fields[0] === '')) {
      records.push({ line: recordLine, fields });
    }
    fields = [];
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          current += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line += 1;
        current += char;
      }
      continue;
    }

    if (char === '"' && !quoted && current.trim() === '') {
      current = '';
      quoted = true;
      inQuotes = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\r') {
      // swallowed; the following \n ends the record
    } else if (char === '\n') {
      endRecord();
      line += 1;
      recordLine = line;
    } else if (quoted && (char === ' ' || char === '\t')) {
      // padding between a closing quote and the separator
    } else {
      current += char;
    }
  }

  if (current !== '' || quoted || fields.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV text whose first record is the header.
 *
 * Header names and unquoted values are trimmed; quoted values keep their
 * whitespace. Missing trailing fields read as empty strings; surplus
 * fields are dropped.
 */
export function parseCsv(text: string): CsvTable {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const raw = splitRecords(body);

  if (raw.length === 0) {
    return { header: [], records: [] };
  }

  const header = raw[0].fields.map((h) => h.trim());
  const records: CsvRecord[] = raw.slice(1).map((record) => {
    const values: CsvRow = {};
    header.forEach((name, i) => {
      values[name] = record.fields[i] ?? '';
    });
    return { line: record.line, values };
  });

  return { header, records };
}

export function readCsvFile(path: string): CsvTable {
  return parseCsv(readFileSync(path, 'utf-8'));
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (NEEDS_QUOTING.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize rows under the given header. Columns absent from a row are
 * written empty.
 */
export function formatCsv(header: readonly string[], rows: readonly CsvRow[]): string {
  const lines = [header.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(header.map((name) => escapeCsvField(row[name] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
}
