export { validateCsvSchema, DEFAULT_DELIMITER, DEFAULT_ENCODING } from './validation/validateCsv';
export { conformsToType, matchDateFormat } from './validation/typeCheckers';
export type { DateFormat } from './validation/typeCheckers';
export { renderValidationReport, printValidationReport } from './report/validationReport';
export type { ReportOptions } from './report/validationReport';
export { appendRunLog } from './report/runLog';
export {
  loadSchemaFile,
  parseSchemaDefinition,
  parseSchemaJson,
  SchemaDefinitionError,
} from './config/schemaDefinition';
export type { ColumnDefinition, LoadedSchema, SchemaDefinition } from './config/schemaDefinition';
export { getSchemaByName, listSchemaNames, usersSchema } from './config/recordSchema';
export { detectDelimiter, resolveDelimiter } from './parsers/csvParser';
export { COLUMN_TYPES, isRequired } from './types/schema';
export type { CellValidator, ColumnRule, ColumnType, Schema, ValidateOptions } from './types/schema';
export { ERROR_KINDS } from './types/validation';
export type { ErrorKind, ErrorSummary, ValidationError, ValidationResult } from './types/validation';
