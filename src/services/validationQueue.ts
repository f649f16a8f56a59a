import { queue as asyncQueue, QueueObject } from 'async';
import * as fs from 'fs';
import { Schema, ValidateOptions } from '../types/schema';
import { ValidationResult } from '../types/validation';
import { validateCsvSchema } from '../validation/validateCsv';

export interface ValidationJob {
  /** Stored upload; deleted once the job finishes */
  filePath: string;
  originalName: string;
  schemaName: string;
  schema: Schema;
  options: ValidateOptions;
}

/**
 * Delete a temporary upload, logging instead of failing.
 */
export function cleanupFile(filePath: string): void {
  if (filePath && fs.existsSync(filePath)) {
    try {
      fs.unlinkSync(filePath);
      console.log(`[Cleanup] Deleted temporary file: ${filePath}`);
    } catch (unlinkError) {
      console.error('[Cleanup] Error deleting temp file:', unlinkError);
    }
  }
}

/**
 * Validate one uploaded file, always removing it afterwards.
 */
export function runValidationJob(job: ValidationJob): ValidationResult {
  console.log(`[Queue] Validating ${job.originalName} against schema '${job.schemaName}'`);
  try {
    const result = validateCsvSchema(job.filePath, job.schema, job.options);
    console.log(
      `[Queue] ${job.originalName}: ${result.valid ? 'valid' : 'invalid'} ` +
        `(${result.totalRows} rows, ${result.errorCount} errors)`
    );
    return result;
  } finally {
    cleanupFile(job.filePath);
  }
}

export class ValidationQueue {
  private readonly queue: QueueObject<ValidationJob>;

  /**
   * Validations run one file at a time by default.
   */
  constructor(concurrency: number = 1) {
    this.queue = asyncQueue(async (job: ValidationJob) => runValidationJob(job), concurrency);
    this.queue.error((err, job) => {
      console.error(`[Queue] Job for ${job.originalName} failed with error:`, err);
    });
  }

  /**
   * Queue a job and resolve with its result once it has run.
   * The result is reported by file name rather than by the temporary path.
   */
  submit(job: ValidationJob): Promise<ValidationResult> {
    return new Promise((resolve, reject) => {
      this.queue.push<ValidationResult>(job, (err, result) => {
        if (err) {
          reject(err);
        } else if (result === undefined) {
          reject(new Error(`Validation of ${job.originalName} produced no result`));
        } else {
          resolve(Object.freeze({ ...result, filePath: job.originalName }));
        }
      });
    });
  }

  stats(): { length: number; running: number; idle: boolean } {
    return {
      length: this.queue.length(),
      running: this.queue.running(),
      idle: this.queue.idle(),
    };
  }
}
