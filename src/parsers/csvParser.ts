import { parse } from 'csv-parse/sync';
import * as fs from 'fs';
import { TextDecoder } from 'util';

import { ParsedTable } from '../types/csv';

const SAMPLE_BYTES = 4096;

/**
 * Pick the delimiter by counting candidates in the first line of the file,
 * decoded under the file's own encoding.
 * Tabs win ties with commas; semicolons only count when there are neither.
 */
export function detectDelimiter(filePath: string, encoding = 'utf-8'): string {
  try {
    const bytes = fs.readFileSync(filePath).subarray(0, SAMPLE_BYTES);
    const sample = new TextDecoder(encoding).decode(bytes);
    const firstLine = sample.split(/\r?\n/)[0] ?? '';
    const tabCount = (firstLine.match(/\t/g) || []).length;
    const commaCount = (firstLine.match(/,/g) || []).length;
    const semicolonCount = (firstLine.match(/;/g) || []).length;

    if (tabCount > 0 && tabCount >= commaCount) return '\t';
    if (commaCount > 0) return ',';
    if (semicolonCount > 0) return ';';
    return ',';
  } catch {
    // Unreadable files fall back to commas; the validator reports the real problem
    return ',';
  }
}

/**
 * Resolve a user-supplied delimiter name: 'auto' samples the file, 'tab' means '\t'.
 */
export function resolveDelimiter(filePath: string, requested: string | undefined, encoding = 'utf-8'): string {
  if (requested === undefined || requested === '') return ',';
  if (requested === 'auto') return detectDelimiter(filePath, encoding);
  if (requested === 'tab' || requested === '\\t') return '\t';
  return requested;
}

function toRows(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    throw new Error('Parser did not return a list of records');
  }
  return records.map((record: unknown) => {
    if (!Array.isArray(record)) {
      throw new Error('Parser returned a record that is not a list of fields');
    }
    return record.map((field: unknown) => (typeof field === 'string' ? field : String(field)));
  });
}

/**
 * Parse decoded file text into a header row and data rows.
 * Empty lines are skipped and ragged rows are kept as-is.
 * Returns null when there is no header record at all.
 * csv-parse errors (CsvError) propagate to the caller.
 */
export function parseDelimitedText(text: string, delimiter: string = ','): ParsedTable | null {
  const records = toRows(
    parse(text, {
      delimiter,
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    })
  );

  const [headers, ...rows] = records;
  if (headers === undefined) {
    return null;
  }

  const headerMap = new Map<string, number>();
  headers.forEach((header, index) => {
    headerMap.set(header, index);
  });

  return { headerMap, headers, rows };
}
