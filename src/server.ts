import * as fs from 'fs';
import * as path from 'path';
import { createApp } from './app';
import { DEFAULT_MAX_ERRORS, PORT, STORAGE_DIR, STORAGE_MAX_AGE_MS } from './config/settings';
import { UPLOAD_PREFIX } from './middleware/upload';

/**
 * Clean up old files in storage directory (handles orphaned files from crashes)
 */
export function cleanupOldStorageFiles(storageDir: string = STORAGE_DIR, maxAgeMs: number = STORAGE_MAX_AGE_MS): number {
  let cleanedCount = 0;
  try {
    if (!fs.existsSync(storageDir)) {
      return 0;
    }

    const now = Date.now();
    for (const file of fs.readdirSync(storageDir)) {
      if (!file.startsWith(UPLOAD_PREFIX)) {
        continue; // Skip non-upload files
      }

      const filePath = path.join(storageDir, file);
      try {
        const stats = fs.statSync(filePath);
        if (now - stats.mtimeMs > maxAgeMs) {
          fs.unlinkSync(filePath);
          cleanedCount++;
        }
      } catch (err) {
        console.error(`[Cleanup] Error processing file ${file}:`, err);
      }
    }

    if (cleanedCount > 0) {
      console.log(`[Cleanup] Removed ${cleanedCount} orphaned file(s) from storage`);
    }
  } catch (err) {
    console.error('[Cleanup] Error cleaning storage directory:', err);
  }
  return cleanedCount;
}

function main(): void {
  cleanupOldStorageFiles();

  const app = createApp();

  process.on('uncaughtException', (err: Error) => {
    console.error('UNCAUGHT EXCEPTION! Shutting down...');
    console.error(err.name, err.message);
    console.error(err.stack);
    cleanupOldStorageFiles();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    console.error('UNHANDLED REJECTION! Shutting down...');
    console.error(reason);
    process.exit(1);
  });

  process.on('SIGTERM', () => {
    console.log('SIGTERM received, shutting down...');
    process.exit(0);
  });

  process.on('SIGINT', () => {
    console.log('SIGINT received, shutting down...');
    process.exit(0);
  });

  app.listen(PORT, () => {
    console.log(`CSV validation server running on port ${PORT}`);
    console.log(`Storage directory: ${STORAGE_DIR}`);
    console.log(`Default error cap: ${DEFAULT_MAX_ERRORS > 0 ? DEFAULT_MAX_ERRORS : 'unlimited'}`);
  });
}

if (require.main === module) {
  main();
}
