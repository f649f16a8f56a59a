import { parseDelimitedText } from '../parsers/csvParser';
import { ParsedTable } from '../types/csv';
import { ColumnRule, isRequired, Schema, schemaEntries, ValidateOptions } from '../types/schema';
import { ValidationResult } from '../types/validation';
import { checkFileAccess, readWithEncoding } from './fileAccess';
import { ResultBuilder } from './resultBuilder';
import { conformsToType } from './typeCheckers';

export const DEFAULT_ENCODING = 'utf-8';
export const DEFAULT_DELIMITER = ',';

// The header is line 1, so the first data record is line 2.
const FIRST_DATA_LINE = 2;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse the header and report schema columns it lacks.
 * Returns the parsed table only when every schema column is present.
 */
function checkStructure(
  text: string,
  delimiter: string,
  columns: Array<[string, ColumnRule]>,
  result: ResultBuilder
): ParsedTable | null {
  let table: ParsedTable | null;
  try {
    table = parseDelimitedText(text, delimiter);
  } catch (error) {
    result.addError(0, '', 'structural', `CSV parsing error: ${describe(error)}`);
    return null;
  }

  if (!table) {
    result.addError(1, '', 'structural', 'No headers found in CSV file');
    return null;
  }

  let missing = 0;
  for (const [column] of columns) {
    if (!table.headerMap.has(column)) {
      result.addError(1, column, 'structural', `Required column '${column}' not found in CSV headers`);
      missing++;
    }
  }

  return missing === 0 ? table : null;
}

/**
 * Check one cell. Returns false when it produced an error.
 * Order is required → type → custom; a failed step skips the rest.
 */
function checkCell(
  rawValue: string,
  line: number,
  column: string,
  rule: ColumnRule,
  result: ResultBuilder
): boolean {
  const value = rawValue.trim();

  if (value === '') {
    if (isRequired(rule)) {
      result.addError(line, column, 'required', `Required field '${column}' is empty or missing`);
      return false;
    }
    return true;
  }

  if (!conformsToType(value, rule.type)) {
    result.addError(
      line,
      column,
      'type',
      `Invalid type for '${column}'. Expected ${rule.type}, got '${value}'`,
      value
    );
    return false;
  }

  if (!rule.validator) {
    return true;
  }

  try {
    if (rule.validator(value)) {
      return true;
    }
    result.addError(line, column, 'custom', `Custom validation failed for '${column}' with value '${value}'`, value);
  } catch (error) {
    result.addError(line, column, 'custom', `Custom validator error for '${column}': ${describe(error)}`, value);
  }
  return false;
}

function validateRows(table: ParsedTable, columns: Array<[string, ColumnRule]>, result: ResultBuilder): void {
  for (let index = 0; index < table.rows.length; index++) {
    if (!result.shouldContinue()) {
      return;
    }

    const row = table.rows[index];
    const line = index + FIRST_DATA_LINE;
    result.countRow();

    let rowValid = true;
    for (const [column, rule] of columns) {
      const cellIndex = table.headerMap.get(column);
      const rawValue = cellIndex === undefined ? '' : (row[cellIndex] ?? '');

      if (!checkCell(rawValue, line, column, rule, result)) {
        rowValid = false;
        if (!result.shouldContinue()) {
          return;
        }
      }
    }

    if (rowValid) {
      result.countValidRow();
    }
  }
}

/**
 * Validate a delimited text file against a column schema.
 *
 * Never throws: every problem, from a missing file to a validator that
 * blows up, is recorded in the returned result. File and header problems
 * stop validation early; cell problems are collected until `maxErrors`.
 *
 * @example
 * const result = validateCsvSchema('users.csv', {
 *   user_id: { type: 'integer' },
 *   email: { type: 'string', validator: v => v.includes('@') },
 *   age: { type: 'integer', nullable: true },
 * });
 */
export function validateCsvSchema(filePath: string, schema: Schema, options: ValidateOptions = {}): ValidationResult {
  const encoding = options.encoding ?? DEFAULT_ENCODING;
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const result = new ResultBuilder(filePath, options.maxErrors);
  const columns = schemaEntries(schema);

  if (!checkFileAccess(filePath, result)) {
    return result.finalize();
  }

  const text = readWithEncoding(filePath, encoding, result);
  if (text === null) {
    return result.finalize();
  }

  const table = checkStructure(text, delimiter, columns, result);
  if (!table) {
    return result.finalize();
  }

  try {
    validateRows(table, columns, result);
  } catch (error) {
    result.addError(0, '', 'file', `Unexpected error during validation: ${describe(error)}`);
  }

  return result.finalize();
}
