// ══ Delimited-text decoding: separator, encoding, ragged rows ═════════════

import { parse } from 'csv-parse/sync';
import { DecodeError, describeError } from '../types/errors';

export const SEPARATOR_CANDIDATES = [';', ',', '\t', '|'] as const;
export type Separator = (typeof SEPARATOR_CANDIDATES)[number];

// Tried in order after BOM sniffing. windows-1252 is a superset of latin-1
// for printable text and never fails to decode, so it closes the list.
export const ENCODING_PRIORITY = ['utf-8', 'windows-1252'] as const;

const SEPARATOR_SAMPLE_BYTES = 2000;
const EXTRA_COLUMN_PREFIX = '_extra_';

/** One source line: header → cell, in header order. */
export type RawRow = ReadonlyMap<string, string>;

export interface DecodedTable {
  fileName: string;
  headers: string[];
  rows: RawRow[];
  /** Source line of each data row (header on line 1 gives row 2 onwards). */
  rowNumbers: number[];
  separator: Separator;
  encoding: string;
}

/**
 * Picks the candidate with the most occurrences in the first 2000 bytes.
 * Ties go to the earlier candidate, so a file with no separator at all
 * reads as ';'.
 */
export function detectSeparator(bytes: Uint8Array): Separator {
  const sample = new TextDecoder('latin1').decode(bytes.subarray(0, SEPARATOR_SAMPLE_BYTES));

  let best: Separator = SEPARATOR_CANDIDATES[0];
  let bestCount = -1;
  for (const candidate of SEPARATOR_CANDIDATES) {
    const count = sample.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Encodings to attempt for this buffer.
 * - UTF-16 LE BOM (FF FE) → utf-16le first
 * - otherwise the fixed priority list (a UTF-8 BOM is stripped by TextDecoder)
 */
export function encodingCandidates(bytes: Uint8Array): string[] {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return ['utf-16le', ...ENCODING_PRIORITY];
  }
  return [...ENCODING_PRIORITY];
}

// Shape of each record when csv-parse runs with `info: true`
interface ParsedRecord {
  record: string[];
  info: { lines: number };
}

interface ParsedLine {
  cells: string[];
  /** Physical line the record ends on (1-based), blank and skipped lines included. */
  line: number;
}

function parseRecords(text: string, separator: Separator): ParsedLine[] {
  const records: ParsedRecord[] = parse(text, {
    delimiter: separator,
    bom: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    skip_records_with_empty_values: true,
    skip_records_with_error: true,
  });
  return records.map(({ record, info }) => ({ cells: record, line: info.lines }));
}

/**
 * Builds header-keyed rows. Rows wider than the header get synthesized
 * `_extra_<n>` headers for the surplus cells, which are then dropped: the
 * exporters append a trailing delimiter to data lines but not to the header.
 * Short rows are padded with empty cells. A repeated header keeps its first column.
 */
export function toRawRows(header: string[], records: string[][]): RawRow[] {
  const width = records.reduce((max, r) => Math.max(max, r.length), header.length);
  const extended = [...header];
  for (let i = 0; extended.length < width; i++) {
    extended.push(`${EXTRA_COLUMN_PREFIX}${i}`);
  }

  return records.map((cells) => {
    const row = new Map<string, string>();
    extended.forEach((name, index) => {
      if (row.has(name)) return;
      row.set(name, cells[index] ?? '');
    });
    for (const name of row.keys()) {
      if (name.startsWith(EXTRA_COLUMN_PREFIX)) row.delete(name);
    }
    return row;
  });
}

/**
 * Decodes a delimited export of unknown encoding and separator.
 * Throws DecodeError when no encoding yields at least one data row.
 */
export function decodeTable(bytes: Uint8Array, fileName = 'unnamed'): DecodedTable {
  if (bytes.length === 0) {
    throw new DecodeError(fileName, 'file is empty');
  }

  const separator = detectSeparator(bytes);
  const failures: string[] = [];

  for (const encoding of encodingCandidates(bytes)) {
    let records: ParsedLine[];
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
      records = parseRecords(text, separator);
    } catch (error) {
      failures.push(`${encoding}: ${describeError(error)}`);
      continue;
    }

    const [first, ...data] = records;
    if (!first || data.length === 0) {
      failures.push(`${encoding}: no data rows`);
      continue;
    }

    const headers = first.cells.map((h) => h.trim());
    const rows = toRawRows(headers, data.map((r) => r.cells));
    console.log(
      `[Decoder] ${fileName}: separator ${JSON.stringify(separator)}, ${encoding}, ${rows.length} rows`
    );

    return {
      fileName,
      headers,
      rows,
      rowNumbers: data.map((r) => r.line),
      separator,
      encoding,
    };
  }

  throw new DecodeError(fileName, failures.join('; '));
}
