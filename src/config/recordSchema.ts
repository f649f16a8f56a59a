import { Schema } from '../types/schema';

/**
 * Example schema for a user export.
 *
 * Customize this schema based on your actual data structure.
 * The column names should match the headers in your CSV/TSV files.
 */
export const usersSchema: Schema = {
  user_id: { type: 'integer', required: true },
  username: { type: 'string', required: true },
  email: { type: 'string', required: true, validator: value => /^[^@\s]+@[^@\s]+\.[^@\s]+$/.test(value) },
  age: { type: 'integer', required: false, validator: value => Number(value) >= 0 && Number(value) <= 150 },
  signup_date: { type: 'date', required: true },
  is_active: { type: 'boolean', required: false },
};

const schemas: Record<string, Schema> = {
  users: usersSchema,
};

/**
 * Get a built-in schema by name
 */
export function getSchemaByName(name: string): Schema | undefined {
  return Object.prototype.hasOwnProperty.call(schemas, name) ? schemas[name] : undefined;
}

export function listSchemaNames(): string[] {
  return Object.keys(schemas);
}
