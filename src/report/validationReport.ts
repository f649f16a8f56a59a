import { ERROR_KINDS, ErrorKind, ValidationResult } from '../types/validation';

export interface ReportOptions {
  /** Include individual errors (default: false) */
  verbose?: boolean;
  /** Maximum number of individual errors listed in verbose mode (default: 100) */
  maxDetails?: number;
}

const RULE_WIDTH = 70;

function kindLabel(kind: ErrorKind): string {
  return `${kind.charAt(0).toUpperCase()}${kind.slice(1)} Errors`;
}

/**
 * Render a finished validation result as plain text.
 */
export function renderValidationReport(result: ValidationResult, options: ReportOptions = {}): string {
  const maxDetails = options.maxDetails ?? 100;
  const heavy = '='.repeat(RULE_WIDTH);
  const light = '-'.repeat(RULE_WIDTH);

  const lines: string[] = [
    '',
    heavy,
    'CSV VALIDATION REPORT',
    heavy,
    `File: ${result.filePath}`,
    `Status: ${result.valid ? '✓ VALID' : '✗ INVALID'}`,
    `Total Rows: ${result.totalRows}`,
    `Rows Validated: ${result.rowsValidated}`,
    `Total Errors: ${result.errorCount}`,
  ];

  if (result.errorCount > 0) {
    lines.push('', light, 'ERROR SUMMARY', light);
    for (const kind of ERROR_KINDS) {
      const count = result.summary[kind];
      if (count > 0) {
        lines.push(`${kindLabel(kind)}: ${count}`);
      }
    }

    if (options.verbose && result.errors.length > 0) {
      lines.push('', light, 'DETAILED ERRORS', light);
      result.errors.slice(0, maxDetails).forEach((error, i) => {
        lines.push('', `${i + 1}. Line ${error.line}, Column '${error.column}'`);
        lines.push(`   Type: ${error.kind}`);
        lines.push(`   Message: ${error.message}`);
        if (error.value !== undefined) {
          lines.push(`   Value: ${error.value}`);
        }
      });

      if (result.errors.length > maxDetails) {
        lines.push('', `... and ${result.errors.length - maxDetails} more errors`);
      }
    }
  }

  lines.push('', heavy, '');
  return lines.join('\n');
}

export function printValidationReport(result: ValidationResult, options: ReportOptions = {}): void {
  console.log(renderValidationReport(result, options));
}
