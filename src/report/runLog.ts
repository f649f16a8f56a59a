import * as fs from 'fs';
import { ValidationResult } from '../types/validation';

export function formatRunLogLine(result: ValidationResult, at: Date): string {
  return [
    at.toISOString(),
    result.filePath,
    result.valid ? 'VALID' : 'INVALID',
    String(result.totalRows),
    String(result.errorCount),
  ].join('\t');
}

/**
 * Append one line describing a validation run to a log file.
 * A log that cannot be opened only produces a warning; returns whether the line was written.
 */
export function appendRunLog(logPath: string, result: ValidationResult, at: Date = new Date()): boolean {
  try {
    fs.appendFileSync(logPath, formatRunLogLine(result, at) + '\n', { encoding: 'utf-8' });
    return true;
  } catch (err) {
    console.error(`[RunLog] Could not write to ${logPath}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}
