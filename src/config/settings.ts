import * as path from 'path';

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const PORT = intFromEnv('PORT', 3001);
export const STORAGE_DIR = process.env.STORAGE_DIR || path.join(process.cwd(), 'storage');
export const STORAGE_MAX_AGE_MS = intFromEnv('STORAGE_MAX_AGE_MS', 3600000); // 1 hour default
export const MAX_UPLOAD_BYTES = intFromEnv('MAX_UPLOAD_BYTES', 1024 * 1024 * 1024); // 1GB limit

/** Error cap applied to uploads that do not set one; 0 disables it */
export const DEFAULT_MAX_ERRORS = intFromEnv('DEFAULT_MAX_ERRORS', 1000);
