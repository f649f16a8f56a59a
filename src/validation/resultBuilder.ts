import { ErrorKind, ValidationError, ValidationResult } from '../types/validation';

/**
 * Mutable accumulator for a single validation call.
 *
 * Stages receive the builder explicitly; counters only grow and errors are
 * only appended. `finalize()` hands back a frozen snapshot.
 */
export class ResultBuilder {
  private readonly errors: ValidationError[] = [];
  private readonly summary: Record<ErrorKind, number> = {
    file: 0,
    structural: 0,
    type: 0,
    required: 0,
    custom: 0,
  };
  private totalRows = 0;
  private rowsValidated = 0;

  constructor(
    private readonly filePath: string,
    private readonly maxErrors?: number
  ) {}

  get errorCount(): number {
    return this.errors.length;
  }

  addError(line: number, column: string, kind: ErrorKind, message: string, value?: string): void {
    const error: ValidationError = value === undefined
      ? { line, column, kind, message }
      : { line, column, kind, message, value };
    this.errors.push(Object.freeze(error));
    this.summary[kind] += 1;
  }

  /**
   * False once the error cap has been reached.
   */
  shouldContinue(): boolean {
    return this.maxErrors === undefined || this.errors.length < this.maxErrors;
  }

  countRow(): void {
    this.totalRows += 1;
  }

  countValidRow(): void {
    this.rowsValidated += 1;
  }

  finalize(): ValidationResult {
    return Object.freeze({
      valid: this.errors.length === 0,
      filePath: this.filePath,
      totalRows: this.totalRows,
      rowsValidated: this.rowsValidated,
      errorCount: this.errors.length,
      summary: Object.freeze({ ...this.summary }),
      errors: Object.freeze([...this.errors]),
    });
  }
}
