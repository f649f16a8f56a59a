/**
 * Types describing the outcome of a validation run.
 */

export type ErrorKind = 'file' | 'structural' | 'type' | 'required' | 'custom';

export const ERROR_KINDS: readonly ErrorKind[] = ['file', 'structural', 'type', 'required', 'custom'];

export interface ValidationError {
  /** 0 = file level, 1 = header, 2+ = data record */
  readonly line: number;
  /** Empty for errors not tied to a column */
  readonly column: string;
  readonly kind: ErrorKind;
  readonly message: string;
  /** The offending cell text, for type and custom errors */
  readonly value?: string;
}

export type ErrorSummary = Readonly<Record<ErrorKind, number>>;

export interface ValidationResult {
  readonly valid: boolean;
  readonly filePath: string;
  readonly totalRows: number;
  readonly rowsValidated: number;
  readonly errorCount: number;
  readonly summary: ErrorSummary;
  readonly errors: readonly ValidationError[];
}
