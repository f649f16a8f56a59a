import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { cleanupOldStorageFiles } from './server';

describe('cleanupOldStorageFiles', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-storage-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should remove stale uploads and keep everything else', () => {
    const stale = path.join(tmpDir, 'validate-upload-1.csv');
    const fresh = path.join(tmpDir, 'validate-upload-2.csv');
    const other = path.join(tmpDir, 'notes.txt');
    for (const file of [stale, fresh, other]) {
      fs.writeFileSync(file, 'id\n1\n');
    }
    const twoHoursAgo = new Date(Date.now() - 2 * 3600000);
    fs.utimesSync(stale, twoHoursAgo, twoHoursAgo);
    fs.utimesSync(other, twoHoursAgo, twoHoursAgo);

    const removed = cleanupOldStorageFiles(tmpDir, 3600000);

    expect(removed).toBe(1);
    expect(fs.existsSync(stale)).toBe(false);
    expect(fs.existsSync(fresh)).toBe(true);
    expect(fs.existsSync(other)).toBe(true);
  });

  it('should do nothing when the storage directory does not exist', () => {
    expect(cleanupOldStorageFiles(path.join(tmpDir, 'absent'), 0)).toBe(0);
  });
});
