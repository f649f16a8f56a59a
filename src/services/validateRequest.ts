import { z } from 'zod';
import { getSchemaByName } from '../config/recordSchema';
import { parseSchemaJson } from '../config/schemaDefinition';
import { resolveDelimiter } from '../parsers/csvParser';
import { Schema, ValidateOptions } from '../types/schema';

/**
 * Multipart form fields accepted by POST /api/validate (all arrive as strings).
 */
export const ValidateFormSchema = z
  .object({
    schema: z.string().min(1).optional(),
    schemaName: z.string().min(1).optional(),
    delimiter: z.string().optional(),
    encoding: z.string().min(1).optional(),
    maxErrors: z
      .string()
      .regex(/^\d+$/, 'must be a positive integer')
      .transform(value => parseInt(value, 10))
      .refine(value => value > 0, 'must be a positive integer')
      .optional(),
  })
  .refine(form => form.schema !== undefined || form.schemaName !== undefined, {
    message: 'Either schema or schemaName is required',
  });

export type ValidateForm = z.infer<typeof ValidateFormSchema>;

export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

export interface ResolvedRequest {
  schemaName: string;
  schema: Schema;
  options: ValidateOptions;
}

/**
 * Turn the form body of an upload into a schema and validator options.
 * `defaultMaxErrors` applies when the form sets no cap; 0 means unlimited.
 */
export function resolveValidateRequest(body: unknown, filePath: string, defaultMaxErrors: number): ResolvedRequest {
  const parsed = ValidateFormSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new RequestError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'form'}: ${issue.message}`).join('; ')
    );
  }
  const form = parsed.data;

  let schemaName: string;
  let schema: Schema;
  if (form.schema !== undefined) {
    const loaded = parseSchemaJson(form.schema, 'uploaded');
    schemaName = loaded.name;
    schema = loaded.schema;
  } else {
    schemaName = form.schemaName ?? '';
    const builtIn = getSchemaByName(schemaName);
    if (!builtIn) {
      throw new RequestError(`Unknown schema: ${schemaName}`);
    }
    schema = builtIn;
  }

  const maxErrors = form.maxErrors ?? (defaultMaxErrors > 0 ? defaultMaxErrors : undefined);
  const options: ValidateOptions = {
    delimiter: resolveDelimiter(filePath, form.delimiter, form.encoding),
  };
  if (form.encoding !== undefined) options.encoding = form.encoding;
  if (maxErrors !== undefined) options.maxErrors = maxErrors;

  return { schemaName, schema, options };
}
