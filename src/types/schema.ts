/**
 * Schema definitions for CSV/TSV validation.
 *
 * A schema maps header names to the rules every cell of that column must
 * satisfy. Column order is the order errors are reported in.
 */

export const COLUMN_TYPES = ['string', 'integer', 'float', 'boolean', 'date'] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

/**
 * Custom predicate applied to a trimmed, non-empty, type-checked cell.
 * Returning false or throwing both count as a failed check.
 */
export type CellValidator = (value: string) => boolean;

export interface ColumnRule {
  /** The type the cell text must parse as */
  type: ColumnType;
  /** Whether an empty cell is an error (default: !nullable, or true) */
  required?: boolean;
  /** Alternative to `required`, only consulted when `required` is absent */
  nullable?: boolean;
  /** Optional semantic check run after the type check passes */
  validator?: CellValidator;
}

/**
 * Column name → rule. A Map keeps integer-like column names in the order
 * they were declared, which a plain object does not.
 */
export type Schema = Readonly<Record<string, ColumnRule>> | ReadonlyMap<string, ColumnRule>;

export interface ValidateOptions {
  /** Text encoding label understood by TextDecoder (default: 'utf-8') */
  encoding?: string;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Stop collecting after this many errors (default: unlimited) */
  maxErrors?: number;
}

function isSchemaMap(schema: Schema): schema is ReadonlyMap<string, ColumnRule> {
  return schema instanceof Map;
}

export function schemaEntries(schema: Schema): Array<[string, ColumnRule]> {
  if (isSchemaMap(schema)) {
    return Array.from(schema.entries());
  }
  return Object.entries(schema);
}

export function isRequired(rule: ColumnRule): boolean {
  if (rule.required !== undefined) return rule.required;
  if (rule.nullable !== undefined) return !rule.nullable;
  return true;
}
