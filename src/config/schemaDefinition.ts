import * as fs from 'fs';
import { z } from 'zod';
import { CellValidator, ColumnRule, COLUMN_TYPES } from '../types/schema';

/**
 * JSON form of a schema, for callers that cannot pass functions
 * (CLI flags, multipart form fields). Declarative constraints are
 * compiled into a single custom validator per column.
 */

const ColumnTypeSchema = z.enum(COLUMN_TYPES);

const RegexSourceSchema = z.string().refine(
  source => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const ColumnDefinitionSchema = z
  .object({
    type: ColumnTypeSchema,
    required: z.boolean().optional(),
    nullable: z.boolean().optional(),
    /** Whole-value regular expression */
    pattern: RegexSourceSchema.optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    allowedValues: z.array(z.string()).min(1).optional(),
  })
  .strict();

export const SchemaDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  columns: z
    .record(ColumnDefinitionSchema)
    .refine(columns => Object.keys(columns).length > 0, { message: 'At least one column is required' }),
});

export type ColumnDefinition = z.infer<typeof ColumnDefinitionSchema>;
export type SchemaDefinition = z.infer<typeof SchemaDefinitionSchema>;

export interface LoadedSchema {
  name: string;
  schema: Map<string, ColumnRule>;
}

export class SchemaDefinitionError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SchemaDefinitionError';
  }
}

function toNumber(value: string): number {
  const num = Number(value);
  if (Number.isNaN(num)) {
    throw new Error(`'${value}' is not numeric`);
  }
  return num;
}

/**
 * Build one predicate from a column's declarative constraints.
 * Returns undefined when the column declares none.
 */
export function compileValidator(definition: ColumnDefinition): CellValidator | undefined {
  const checks: CellValidator[] = [];

  if (definition.pattern !== undefined) {
    const regex = new RegExp(`^(?:${definition.pattern})$`);
    checks.push(value => regex.test(value));
  }
  if (definition.min !== undefined) {
    const min = definition.min;
    checks.push(value => toNumber(value) >= min);
  }
  if (definition.max !== undefined) {
    const max = definition.max;
    checks.push(value => toNumber(value) <= max);
  }
  if (definition.minLength !== undefined) {
    const minLength = definition.minLength;
    checks.push(value => value.length >= minLength);
  }
  if (definition.maxLength !== undefined) {
    const maxLength = definition.maxLength;
    checks.push(value => value.length <= maxLength);
  }
  if (definition.allowedValues !== undefined) {
    const allowed = new Set(definition.allowedValues);
    checks.push(value => allowed.has(value));
  }

  if (checks.length === 0) {
    return undefined;
  }
  return value => checks.every(check => check(value));
}

function toColumnRule(definition: ColumnDefinition): ColumnRule {
  const rule: ColumnRule = { type: definition.type };
  if (definition.required !== undefined) rule.required = definition.required;
  if (definition.nullable !== undefined) rule.nullable = definition.nullable;

  const validator = compileValidator(definition);
  if (validator) rule.validator = validator;
  return rule;
}

/**
 * Validate an untrusted value as a schema definition and compile it.
 */
export function parseSchemaDefinition(input: unknown, fallbackName: string = 'custom'): LoadedSchema {
  const parsed = SchemaDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new SchemaDefinitionError('Invalid schema definition', issues);
  }

  const schema = new Map<string, ColumnRule>();
  for (const [column, definition] of Object.entries(parsed.data.columns)) {
    schema.set(column, toColumnRule(definition));
  }

  return { name: parsed.data.name ?? fallbackName, schema };
}

export function parseSchemaJson(json: string, fallbackName?: string): LoadedSchema {
  let input: unknown;
  try {
    input = JSON.parse(json);
  } catch (err) {
    throw new SchemaDefinitionError(`Schema is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSchemaDefinition(input, fallbackName);
}

/**
 * Read and compile a schema definition file.
 */
export function loadSchemaFile(filePath: string): LoadedSchema {
  let json: string;
  try {
    json = fs.readFileSync(filePath, { encoding: 'utf-8' });
  } catch (err) {
    throw new SchemaDefinitionError(
      `Cannot read schema file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseSchemaJson(json, filePath.split(/[\\/]/).pop()?.replace(/\.json$/i, ''));
}
